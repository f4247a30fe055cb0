import { describe, expect, it } from "vitest";
import { generateCanvas } from "../src/lib/canvas";
import type { WorkerSettings } from "../src/lib/config";
import { encodeJob, type PlanRecord } from "../src/lib/schemas";
import { ArtifactWorker, pause } from "../src/workers/artifactWorker";
import { InMemoryBlobStore, InMemoryJobQueue, InMemoryPlanStore, silentLogger } from "./support/fakes";

const SETTINGS: WorkerSettings = { batchSize: 10, waitTimeSeconds: 0, idleDelayMs: 1, errorBackoffMs: 1 };
const GENERATED_AT = new Date("2026-03-02T10:15:30.000Z");

function pendingRecord(userId: string, recordId: string): PlanRecord {
  const createdAt = "2026-03-02T09:30:00.000Z";
  return {
    PK: `USER#${userId}`,
    SK: `PLAN#${createdAt}#${recordId}`,
    type: "Plan",
    userId,
    recordId,
    createdAt,
    text: "Reflection",
    emotion: "worried",
    sentimentScore: 35,
    weeklyPlan: [],
    isFallback: false,
    artifactStatus: "pending",
    artifactUrl: null,
  };
}

async function setup(recordIds: string[] = ["rec-1"]) {
  const plans = new InMemoryPlanStore();
  const queue = new InMemoryJobQueue();
  const blobs = new InMemoryBlobStore();
  for (const recordId of recordIds) {
    await plans.savePlan(pendingRecord("u1", recordId));
    await queue.enqueue({ recordId, userId: "u1", emotion: "worried", enqueuedAt: "2026-03-02T09:30:00.000Z" });
  }
  const worker = new ArtifactWorker({
    jobs: queue,
    blobs,
    plans,
    logger: silentLogger,
    settings: SETTINGS,
    now: () => GENERATED_AT,
  });
  return { plans, queue, blobs, worker };
}

describe("ArtifactWorker", () => {
  it("uploads the canvas, back-fills the record and deletes the job", async () => {
    const { plans, queue, blobs, worker } = await setup();

    await worker.pollCycle(new AbortController().signal);

    const key = "artifacts/u1/2026/03/02/rec-1.txt";
    expect(blobs.objects.get(key)).toEqual({
      body: generateCanvas("worried", "rec-1", GENERATED_AT).body,
      metadata: {
        record_id: "rec-1",
        user_id: "u1",
        template: "anxious",
        generated_at: "2026-03-02T10:15:30.000Z",
      },
    });
    expect(plans.find("u1", "rec-1")).toMatchObject({
      artifactStatus: "completed",
      artifactUrl: `memory://test-bucket/${key}`,
      artifactGeneratedAt: "2026-03-02T10:15:30.000Z",
    });
    expect(queue.size).toBe(0);
    expect(worker.getTotals()).toEqual({ processed: 1, errors: 0 });
  });

  it("leaves the job on the queue when the upload fails", async () => {
    const { plans, queue, blobs, worker } = await setup();
    blobs.failUploads = true;

    await worker.pollCycle(new AbortController().signal);

    expect(queue.size).toBe(1);
    expect(plans.updateCalls).toBe(0);
    expect(plans.find("u1", "rec-1")?.artifactStatus).toBe("pending");
    expect(worker.getTotals()).toEqual({ processed: 0, errors: 1 });
  });

  it("leaves the job on the queue when the back-fill fails after upload", async () => {
    const { plans, queue, blobs, worker } = await setup();
    plans.failUpdates = true;

    await worker.pollCycle(new AbortController().signal);

    expect(blobs.objects.size).toBe(1);
    expect(queue.size).toBe(1);
    expect(worker.getTotals()).toEqual({ processed: 0, errors: 1 });
  });

  it("overwrites the same object when a requeued job is retried", async () => {
    const { plans, queue, blobs, worker } = await setup();
    plans.failUpdates = true;
    await worker.pollCycle(new AbortController().signal);

    plans.failUpdates = false;
    queue.releaseInFlight();
    await worker.pollCycle(new AbortController().signal);

    expect([...blobs.objects.keys()]).toEqual(["artifacts/u1/2026/03/02/rec-1.txt"]);
    expect(queue.size).toBe(0);
    expect(worker.getTotals()).toEqual({ processed: 1, errors: 1 });
  });

  it("drops the job when the plan record does not exist", async () => {
    const { queue, worker } = await setup([]);
    await queue.enqueue({ recordId: "missing", userId: "u1", emotion: "sad", enqueuedAt: "2026-03-02T09:30:00.000Z" });

    await worker.pollCycle(new AbortController().signal);

    expect(queue.size).toBe(0);
    expect(worker.getTotals()).toEqual({ processed: 0, errors: 1 });
  });

  it("deletes malformed jobs without touching the stores", async () => {
    const { plans, queue, blobs, worker } = await setup([]);
    queue.pushBody("{not json");
    queue.pushBody(JSON.stringify({ user_id: "u1", emotion: "sad", timestamp: "2026-03-02T09:30:00.000Z" }));

    await worker.pollCycle(new AbortController().signal);

    expect(queue.size).toBe(0);
    expect(blobs.objects.size).toBe(0);
    expect(plans.updateCalls).toBe(0);
    expect(worker.getTotals()).toEqual({ processed: 0, errors: 2 });
  });

  it("backs off after a polling error and keeps polling", async () => {
    const { queue, worker } = await setup();
    queue.receiveFailures = 1;
    const signal = new AbortController().signal;

    await worker.pollCycle(signal);
    expect(queue.size).toBe(1);

    await worker.pollCycle(signal);
    expect(queue.size).toBe(0);
    expect(queue.receiveCalls).toBe(2);
  });

  it("encodes job messages in the queue wire format", () => {
    expect(
      JSON.parse(encodeJob({ recordId: "rec-1", userId: "u1", emotion: "sad", enqueuedAt: "2026-03-02T09:30:00.000Z" })),
    ).toEqual({ record_id: "rec-1", user_id: "u1", emotion: "sad", timestamp: "2026-03-02T09:30:00.000Z" });
  });

  describe("shutdown", () => {
    it("leaves unstarted jobs on the queue when shutdown is requested mid-batch", async () => {
      const ids = Array.from({ length: 10 }, (_, index) => `rec-${index + 1}`);
      const { plans, queue, worker } = await setup(ids);
      const shutdown = new AbortController();
      plans.onUpdate = () => {
        if (plans.updateCalls === 7) shutdown.abort();
      };

      const totals = await worker.run(shutdown.signal);

      expect(totals).toEqual({ processed: 7, errors: 0 });
      expect(queue.remainingJobs().map((job) => job.recordId)).toEqual(["rec-8", "rec-9", "rec-10"]);
      expect(plans.find("u1", "rec-7")?.artifactStatus).toBe("completed");
      expect(plans.find("u1", "rec-8")?.artifactStatus).toBe("pending");
      expect(worker.getState()).toBe("stopped");
    });

    it("exits without polling when the signal is already aborted", async () => {
      const { queue, worker } = await setup();
      const shutdown = new AbortController();
      shutdown.abort();

      const totals = await worker.run(shutdown.signal);

      expect(totals).toEqual({ processed: 0, errors: 0 });
      expect(queue.receiveCalls).toBe(0);
    });

    it("refuses to start twice", async () => {
      const { worker } = await setup([]);
      const shutdown = new AbortController();
      shutdown.abort();
      await worker.run(shutdown.signal);

      await expect(worker.run(shutdown.signal)).rejects.toThrow("Worker cannot start from state stopped.");
    });

    it("cuts an idle pause short on abort", async () => {
      const shutdown = new AbortController();
      const started = Date.now();
      const pending = pause(60_000, shutdown.signal);
      shutdown.abort();
      await pending;
      expect(Date.now() - started).toBeLessThan(1_000);
    });
  });
});
