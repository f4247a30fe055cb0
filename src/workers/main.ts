import { loadConfig, requireQueueUrl } from "../lib/config";
import { ConfigurationError } from "../lib/errors";
import { createRuntime } from "../lib/runtime";
import { ArtifactWorker } from "./artifactWorker";

async function main(): Promise<void> {
  const config = loadConfig();
  const queueUrl = requireQueueUrl(config);
  const runtime = createRuntime(config);
  const logger = runtime.logger.child("worker");

  logger.info("Worker configuration", {
    environment: config.isLocal ? "local" : "aws",
    queueUrl,
    bucket: config.bucketName,
    table: config.tableName,
  });

  const shutdown = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (shutdown.signal.aborted) return;
    logger.info(`Received ${signal}, finishing the current job before exiting`);
    shutdown.abort();
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  const worker = new ArtifactWorker({
    jobs: runtime.jobs,
    blobs: runtime.blobs,
    plans: runtime.plans,
    logger,
    settings: config.worker,
  });

  const totals = await worker.run(shutdown.signal);
  logger.info("Worker exited", { ...totals });
}

main().catch((error: unknown) => {
  const label = error instanceof ConfigurationError ? "Configuration error" : "Worker crashed";
  console.error(`${label}:`, error);
  process.exit(1);
});
