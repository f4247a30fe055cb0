import {
  createDocumentClient,
  createS3Client,
  createSecretsClient,
  createSqsClient,
} from "./aws";
import { S3BlobStore } from "./blob";
import { loadConfig, type AppConfig } from "./config";
import { DynamoPlanStore, documentTable } from "./dynamo";
import { EnrichmentClient, geminiGeneratorFactory } from "./enrichment";
import { createLogger, type Logger } from "./logger";
import { SqsJobQueue } from "./queue";
import { SecretCache, secretsManagerLoader } from "./secrets";

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  secrets: SecretCache;
  enrichment: EnrichmentClient;
  plans: DynamoPlanStore;
  jobs: SqsJobQueue;
  blobs: S3BlobStore;
}

/**
 * Wires every AWS-backed component from one config object.
 */
export function createRuntime(config: AppConfig): Runtime {
  const logger = createLogger("reflection-planner", config.logLevel);

  return {
    config,
    logger,
    secrets: new SecretCache(
      secretsManagerLoader(createSecretsClient(config), config.secretsName),
      logger.child("secrets"),
    ),
    enrichment: new EnrichmentClient(
      geminiGeneratorFactory({ model: config.geminiModel, timeoutMs: config.enrichmentTimeoutMs }),
      logger.child("enrichment"),
    ),
    plans: new DynamoPlanStore(
      documentTable(createDocumentClient(config)),
      { tableName: config.tableName, recordIdIndex: config.recordIdIndex },
      logger.child("plans"),
    ),
    jobs: new SqsJobQueue(createSqsClient(config), config.queueUrl, logger.child("queue")),
    blobs: new S3BlobStore(
      createS3Client(config),
      {
        bucketName: config.bucketName,
        localEndpoint: config.isLocal ? config.localstackEndpoint : undefined,
      },
      logger.child("blobs"),
    ),
  };
}

let cached: Runtime | undefined;

/**
 * Lambda containers reuse module state between invocations, so the runtime
 * is built on first use and kept.
 */
export function getRuntime(): Runtime {
  if (!cached) {
    cached = createRuntime(loadConfig());
  }
  return cached;
}
