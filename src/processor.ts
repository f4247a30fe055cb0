import type { KinesisStreamEvent, KinesisStreamRecord } from "aws-lambda";
import { randomUUID } from "crypto";
import type { PlanStore } from "./lib/dynamo";
import type { Enricher } from "./lib/enrichment";
import type { Logger } from "./lib/logger";
import type { JobDispatcher } from "./lib/queue";
import { getRuntime } from "./lib/runtime";
import {
  capText,
  decodeReflection,
  planSortKey,
  userPartitionKey,
  type AnalysisResult,
  type PlanRecord,
  type ReflectionInput,
  type SecondaryJob,
} from "./lib/schemas";
import type { SecretCache } from "./lib/secrets";

export interface StreamProcessorDeps {
  secrets: SecretCache;
  enrichment: Enricher;
  plans: PlanStore;
  dispatcher: JobDispatcher;
  logger: Logger;
  newRecordId?: () => string;
  now?: () => Date;
}

export interface BatchSummary {
  processed: number;
  skipped: number;
  errors: number;
}

export interface BatchResult {
  statusCode: number;
  body: string;
}

type RecordOutcome = "processed" | "skipped";

export function buildPlanRecord(
  input: ReflectionInput,
  recordId: string,
  analysis: AnalysisResult,
  createdAt: string,
): PlanRecord {
  return {
    PK: userPartitionKey(input.userId),
    SK: planSortKey(createdAt, recordId),
    type: "Plan",
    userId: input.userId,
    recordId,
    createdAt,
    text: capText(input.text),
    emotion: analysis.emotion,
    sentimentScore: analysis.sentimentScore,
    weeklyPlan: analysis.weeklyPlan,
    isFallback: analysis.fallback,
    artifactStatus: "pending",
    artifactUrl: null,
  };
}

/**
 * Builds the Kinesis consumer. Records are handled one at a time and in
 * isolation: a bad record is counted and skipped, and the batch still
 * reports success. Only a secret lookup failure fails the invocation.
 */
export function createStreamProcessor(deps: StreamProcessorDeps) {
  const newRecordId = deps.newRecordId ?? randomUUID;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger;

  async function dispatch(job: SecondaryJob): Promise<void> {
    try {
      const queued = await deps.dispatcher.enqueue(job);
      if (!queued) {
        logger.warn("Artifact job not queued, artifact stays pending", { recordId: job.recordId });
      }
    } catch (error) {
      logger.error("Artifact dispatch failed, artifact stays pending", { recordId: job.recordId, error });
    }
  }

  async function processRecord(record: KinesisStreamRecord, apiKey: string): Promise<RecordOutcome> {
    const input = decodeReflection(record.kinesis.data);
    if (!input.text.trim()) {
      logger.warn("Empty text in record, skipping", { eventId: record.eventID });
      return "skipped";
    }

    logger.info("Processing reflection", { userId: input.userId, textLength: input.text.length });

    const analysis = await deps.enrichment.analyze(input.text, apiKey);

    const recordId = newRecordId();
    const createdAt = now().toISOString();
    await deps.plans.savePlan(buildPlanRecord(input, recordId, analysis, createdAt));

    await dispatch({
      recordId,
      userId: input.userId,
      emotion: analysis.emotion,
      enqueuedAt: now().toISOString(),
    });

    logger.info("Processed reflection", { recordId, fallback: analysis.fallback });
    return "processed";
  }

  return async function handler(event: KinesisStreamEvent): Promise<BatchResult> {
    logger.info(`Processing ${event.Records.length} stream records`);

    const { inferenceApiKey } = await deps.secrets.get();
    const summary: BatchSummary = { processed: 0, skipped: 0, errors: 0 };

    for (const record of event.Records) {
      try {
        const outcome = await processRecord(record, inferenceApiKey);
        summary[outcome]++;
      } catch (error) {
        summary.errors++;
        logger.error("Failed to process stream record", { eventId: record.eventID, error });
      }
    }

    logger.info("Batch processing complete", { ...summary });
    return {
      statusCode: 200,
      body: JSON.stringify({ message: "Processing complete", ...summary }),
    };
  };
}

let defaultProcessor: ReturnType<typeof createStreamProcessor> | undefined;

export async function handler(event: KinesisStreamEvent): Promise<BatchResult> {
  if (!defaultProcessor) {
    const runtime = getRuntime();
    defaultProcessor = createStreamProcessor({
      secrets: runtime.secrets,
      enrichment: runtime.enrichment,
      plans: runtime.plans,
      dispatcher: runtime.jobs,
      logger: runtime.logger.child("processor"),
    });
  }
  return defaultProcessor(event);
}
