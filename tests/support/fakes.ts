import type { KinesisStreamEvent, KinesisStreamRecord } from "aws-lambda";
import type { BlobStore } from "../../src/lib/blob";
import type { PlanStore } from "../../src/lib/dynamo";
import { createLogger } from "../../src/lib/logger";
import type { JobDispatcher, JobSource, ReceivedJob } from "../../src/lib/queue";
import { decodeJob, encodeJob, type PlanRecord, type SecondaryJob } from "../../src/lib/schemas";
import { SecretCache } from "../../src/lib/secrets";

export const silentLogger = createLogger("test", "silent");

export function testSecrets(inferenceApiKey = "test-key"): SecretCache {
  return new SecretCache(async () => ({ inferenceApiKey, signingSecret: "test-secret" }), silentLogger);
}

// --- Kinesis -----------------------------------------------------------------

export function rawKinesisRecord(data: string, sequenceNumber = "1"): KinesisStreamRecord {
  return {
    awsRegion: "us-east-1",
    eventID: `shardId-000000000000:${sequenceNumber}`,
    eventName: "aws:kinesis:record",
    eventSource: "aws:kinesis",
    eventSourceARN: "arn:aws:kinesis:us-east-1:000000000000:stream/test-stream",
    eventVersion: "1.0",
    invokeIdentityArn: "arn:aws:iam::000000000000:role/test-role",
    kinesis: {
      kinesisSchemaVersion: "1.0",
      partitionKey: "test-partition",
      sequenceNumber,
      data,
      approximateArrivalTimestamp: 1_760_000_000,
    },
  };
}

export function kinesisRecord(payload: unknown, sequenceNumber = "1"): KinesisStreamRecord {
  const data = Buffer.from(JSON.stringify(payload), "utf-8").toString("base64");
  return rawKinesisRecord(data, sequenceNumber);
}

export function kinesisEvent(...records: KinesisStreamRecord[]): KinesisStreamEvent {
  return { Records: records };
}

// --- Plan store ----------------------------------------------------------------

export class InMemoryPlanStore implements PlanStore {
  private readonly items = new Map<string, PlanRecord>();
  failSaves = false;
  failUpdates = false;
  updateCalls = 0;
  onUpdate?: () => void;

  async savePlan(record: PlanRecord): Promise<void> {
    if (this.failSaves) throw new Error("DynamoDB unavailable");
    const key = `${record.PK}|${record.SK}`;
    if (this.items.has(key)) throw new Error("ConditionalCheckFailedException");
    this.items.set(key, structuredClone(record));
  }

  async markArtifactCompleted(
    userId: string,
    recordId: string,
    artifactUrl: string,
    generatedAt: string,
  ): Promise<boolean> {
    this.updateCalls++;
    this.onUpdate?.();
    if (this.failUpdates) throw new Error("DynamoDB unavailable");
    const item = this.find(userId, recordId);
    if (!item) return false;
    item.artifactUrl = artifactUrl;
    item.artifactStatus = "completed";
    item.artifactGeneratedAt = generatedAt;
    return true;
  }

  async listPlans(userId: string, limit: number): Promise<PlanRecord[]> {
    return this.all()
      .filter((item) => item.userId === userId)
      .sort((a, b) => b.SK.localeCompare(a.SK))
      .slice(0, limit);
  }

  find(userId: string, recordId: string): PlanRecord | undefined {
    return [...this.items.values()].find((item) => item.userId === userId && item.recordId === recordId);
  }

  all(): PlanRecord[] {
    return [...this.items.values()].map((item) => structuredClone(item));
  }
}

// --- Queue ---------------------------------------------------------------------

interface QueuedMessage extends ReceivedJob {
  inFlight: boolean;
}

/**
 * Mimics SQS visibility: received messages are hidden until deleted or
 * released, and stay stored until deleted.
 */
export class InMemoryJobQueue implements JobDispatcher, JobSource {
  private readonly messages: QueuedMessage[] = [];
  private sequence = 0;
  rejectEnqueue = false;
  receiveFailures = 0;
  receiveCalls = 0;

  async enqueue(job: SecondaryJob): Promise<boolean> {
    if (this.rejectEnqueue) return false;
    this.pushBody(encodeJob(job));
    return true;
  }

  pushBody(body: string): void {
    this.sequence++;
    this.messages.push({
      messageId: `msg-${this.sequence}`,
      receiptHandle: `receipt-${this.sequence}`,
      body,
      inFlight: false,
    });
  }

  async receive(maxJobs: number): Promise<ReceivedJob[]> {
    this.receiveCalls++;
    if (this.receiveFailures > 0) {
      this.receiveFailures--;
      throw new Error("SQS unavailable");
    }
    const visible = this.messages.filter((message) => !message.inFlight).slice(0, maxJobs);
    for (const message of visible) message.inFlight = true;
    return visible.map(({ messageId, receiptHandle, body }) => ({ messageId, receiptHandle, body }));
  }

  async acknowledge(receiptHandle: string): Promise<void> {
    const index = this.messages.findIndex((message) => message.receiptHandle === receiptHandle);
    if (index === -1) throw new Error(`Unknown receipt handle ${receiptHandle}`);
    this.messages.splice(index, 1);
  }

  /** Simulates the visibility timeout expiring. */
  releaseInFlight(): void {
    for (const message of this.messages) message.inFlight = false;
  }

  remainingJobs(): SecondaryJob[] {
    return this.messages.map((message) => decodeJob(message.body));
  }

  get size(): number {
    return this.messages.length;
  }
}

// --- Blob store ------------------------------------------------------------------

export interface StoredObject {
  body: string;
  metadata: Record<string, string>;
}

export class InMemoryBlobStore implements BlobStore {
  readonly objects = new Map<string, StoredObject>();
  failUploads = false;

  async putText(key: string, body: string, metadata: Record<string, string>): Promise<string> {
    if (this.failUploads) throw new Error("S3 unavailable");
    this.objects.set(key, { body, metadata });
    return `memory://test-bucket/${key}`;
  }
}
