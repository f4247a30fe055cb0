import { createDocumentClient } from "../src/lib/aws";
import { loadConfig } from "../src/lib/config";
import { DynamoPlanStore, documentTable } from "../src/lib/dynamo";
import { formatPlans } from "../src/functions/plans";
import { createLogger } from "../src/lib/logger";

// Usage: npm run list-plans -- <userId> [limit]
async function run() {
  const [userId, rawLimit = "10"] = process.argv.slice(2);
  const limit = Number.parseInt(rawLimit, 10);
  if (!userId || !Number.isInteger(limit) || limit < 1) {
    console.error("Usage: listPlans <userId> [limit]");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const store = new DynamoPlanStore(
    documentTable(createDocumentClient(config)),
    { tableName: config.tableName, recordIdIndex: config.recordIdIndex },
    createLogger("list-plans", "warn"),
  );

  const plans = await store.listPlans(userId, limit);
  if (plans.length === 0) {
    console.log(`No plans found for ${userId}.`);
    return;
  }

  console.log(JSON.stringify(formatPlans(userId, plans), null, 2));
}

run().catch((error: unknown) => {
  console.error("Error listing plans:", error);
  process.exitCode = 1;
});
