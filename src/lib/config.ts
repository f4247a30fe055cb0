import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { LogLevel } from "./logger";

const flag = z
  .string()
  .default("false")
  .transform((value) => value.trim().toLowerCase() === "true");

const EnvSchema = z.object({
  IS_LOCAL: flag,
  LOCALSTACK_ENDPOINT: z.string().url().default("http://localhost:4566"),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  SECRETS_NAME: z.string().min(1).default("app-secrets"),
  DYNAMODB_TABLE_NAME: z.string().min(1).default("reflection-planner-table"),
  PLAN_RECORD_INDEX: z.string().default("RecordIdIndex"),
  SQS_QUEUE_URL: z.string().default(""),
  S3_BUCKET_NAME: z.string().min(1).default("reflection-planner-artifacts"),
  KINESIS_STREAM_NAME: z.string().min(1).default("reflection-planner-stream"),
  GEMINI_MODEL: z.string().min(1).default("gemini-1.5-flash"),
  ENRICHMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),
  WORKER_BATCH_SIZE: z.coerce.number().int().min(1).max(10).default(10),
  WORKER_WAIT_SECONDS: z.coerce.number().int().min(0).max(20).default(10),
  WORKER_IDLE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  WORKER_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(5_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface WorkerSettings {
  batchSize: number;
  waitTimeSeconds: number;
  idleDelayMs: number;
  errorBackoffMs: number;
}

export interface AppConfig {
  isLocal: boolean;
  localstackEndpoint: string;
  region: string;
  secretsName: string;
  tableName: string;
  /** Empty when lookups by record id should fall back to a partition query. */
  recordIdIndex: string;
  queueUrl: string;
  bucketName: string;
  streamName: string;
  geminiModel: string;
  enrichmentTimeoutMs: number;
  worker: WorkerSettings;
  logLevel: LogLevel;
}

/**
 * Reads the process environment once. The returned object is handed to every
 * component by reference; nothing else reads `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`, { issues });
  }

  const vars = parsed.data;
  return {
    isLocal: vars.IS_LOCAL,
    localstackEndpoint: vars.LOCALSTACK_ENDPOINT,
    region: vars.AWS_REGION,
    secretsName: vars.SECRETS_NAME,
    tableName: vars.DYNAMODB_TABLE_NAME,
    recordIdIndex: vars.PLAN_RECORD_INDEX.trim(),
    queueUrl: vars.SQS_QUEUE_URL.trim(),
    bucketName: vars.S3_BUCKET_NAME,
    streamName: vars.KINESIS_STREAM_NAME,
    geminiModel: vars.GEMINI_MODEL,
    enrichmentTimeoutMs: vars.ENRICHMENT_TIMEOUT_MS,
    worker: {
      batchSize: vars.WORKER_BATCH_SIZE,
      waitTimeSeconds: vars.WORKER_WAIT_SECONDS,
      idleDelayMs: vars.WORKER_IDLE_DELAY_MS,
      errorBackoffMs: vars.WORKER_ERROR_BACKOFF_MS,
    },
    logLevel: vars.LOG_LEVEL,
  };
}

/** The worker cannot run without a queue to poll. */
export function requireQueueUrl(config: AppConfig): string {
  if (!config.queueUrl) {
    throw new ConfigurationError("SQS_QUEUE_URL is not configured.");
  }
  return config.queueUrl;
}
