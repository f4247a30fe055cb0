import { z } from "zod";
import { MalformedInputError, errorMessage } from "./errors";

export const MAX_TEXT_LENGTH = 10_000;
export const ANONYMOUS_USER = "anonymous";

export type ArtifactStatus = "pending" | "completed";

export interface DayPlan {
  day: string;
  tasks: string[];
  focus: string;
  selfCare: string;
}

export interface AnalysisResult {
  emotion: string;
  sentimentScore: number;
  weeklyPlan: DayPlan[];
  fallback: boolean;
}

export interface PlanRecord {
  // Single-table keys: (userId, creation time), record id suffixed for uniqueness
  PK: `USER#${string}`;
  SK: `PLAN#${string}`;

  type: "Plan";
  userId: string;
  recordId: string;
  createdAt: string;

  text: string;
  emotion: string;
  sentimentScore: number;
  weeklyPlan: DayPlan[];
  isFallback: boolean;

  artifactStatus: ArtifactStatus;
  artifactUrl: string | null;
  artifactGeneratedAt?: string;
}

export interface PlanKey {
  PK: PlanRecord["PK"];
  SK: PlanRecord["SK"];
}

export interface SecondaryJob {
  recordId: string;
  userId: string;
  emotion: string;
  enqueuedAt: string;
}

export interface ReflectionInput {
  userId: string;
  text: string;
}

/**
 * Caps text at `MAX_TEXT_LENGTH` UTF-16 units without splitting a surrogate
 * pair: a high surrogate left at the cut is dropped.
 */
export function capText(text: string): string {
  if (text.length <= MAX_TEXT_LENGTH) return text;
  const head = text.slice(0, MAX_TEXT_LENGTH);
  const last = head.charCodeAt(head.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? head.slice(0, -1) : head;
}

export function userPartitionKey(userId: string): PlanRecord["PK"] {
  return `USER#${userId}`;
}

export function planSortKey(createdAt: string, recordId: string): PlanRecord["SK"] {
  return `PLAN#${createdAt}#${recordId}`;
}

// --- Stream record ----------------------------------------------------------

const ReflectionPayloadSchema = z.object({
  text: z.string().nullish(),
  userId: z.string().nullish(),
});

/**
 * Decodes one base64 Kinesis payload into a reflection. An empty `text` is
 * returned as-is; deciding to skip it is the caller's business.
 */
export function decodeReflection(data: string): ReflectionInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(data, "base64").toString("utf-8"));
  } catch (error) {
    throw new MalformedInputError("Stream record is not base64-encoded JSON.", {
      cause: errorMessage(error),
    });
  }

  const result = ReflectionPayloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedInputError("Stream record does not match {text, userId}.", {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }

  const userId = result.data.userId?.trim();
  return {
    userId: userId ? userId : ANONYMOUS_USER,
    text: result.data.text ?? "",
  };
}

// --- Queue message -----------------------------------------------------------

const JobMessageSchema = z.object({
  record_id: z.string().min(1),
  user_id: z.string().min(1),
  emotion: z.string().default("neutral"),
  timestamp: z.string(),
});

type JobMessage = z.infer<typeof JobMessageSchema>;

export function encodeJob(job: SecondaryJob): string {
  const message: JobMessage = {
    record_id: job.recordId,
    user_id: job.userId,
    emotion: job.emotion,
    timestamp: job.enqueuedAt,
  };
  return JSON.stringify(message);
}

export function decodeJob(body: string): SecondaryJob {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new MalformedInputError("Job message body is not JSON.", {
      cause: errorMessage(error),
    });
  }

  const result = JobMessageSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedInputError("Job message is missing required fields.", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  return {
    recordId: result.data.record_id,
    userId: result.data.user_id,
    emotion: result.data.emotion,
    enqueuedAt: result.data.timestamp,
  };
}
