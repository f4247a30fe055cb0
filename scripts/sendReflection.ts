import { PutRecordCommand } from "@aws-sdk/client-kinesis";
import { createKinesisClient } from "../src/lib/aws";
import { loadConfig } from "../src/lib/config";
import type { ReflectionInput } from "../src/lib/schemas";

// Usage: npm run send-reflection -- <userId> <text...>
async function run() {
  const [userId, ...words] = process.argv.slice(2);
  const text = words.join(" ");
  if (!userId || !text) {
    console.error("Usage: sendReflection <userId> <text...>");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const payload: ReflectionInput = { userId, text };
  const kinesis = createKinesisClient(config);

  const response = await kinesis.send(
    new PutRecordCommand({
      StreamName: config.streamName,
      PartitionKey: userId,
      Data: Buffer.from(JSON.stringify(payload), "utf-8"),
    }),
  );

  console.log(`Sent reflection for ${userId} to ${config.streamName}`);
  console.log(`Shard: ${response.ShardId}, sequence: ${response.SequenceNumber}`);
}

run().catch((error: unknown) => {
  console.error("Error sending reflection:", error);
  process.exitCode = 1;
});
