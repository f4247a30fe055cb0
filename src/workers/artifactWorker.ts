import { artifactKey, type BlobStore } from "../lib/blob";
import { generateCanvas } from "../lib/canvas";
import type { WorkerSettings } from "../lib/config";
import type { PlanStore } from "../lib/dynamo";
import { MalformedInputError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import type { JobSource, ReceivedJob } from "../lib/queue";
import { decodeJob, type SecondaryJob } from "../lib/schemas";

export type WorkerState = "idle" | "polling" | "processing" | "stopped";

export interface WorkerTotals {
  processed: number;
  errors: number;
}

export interface ArtifactWorkerDeps {
  jobs: JobSource;
  blobs: BlobStore;
  plans: PlanStore;
  logger: Logger;
  settings: WorkerSettings;
  now?: () => Date;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Long-running consumer of artifact jobs.
 *
 * Each cycle polls the queue, then works through the batch one job at a time:
 * render the canvas, upload it, back-fill the plan record, and only then
 * delete the message. A job that fails anywhere before the delete stays on
 * the queue and comes back after its visibility timeout.
 *
 * Shutdown is cooperative. The signal is checked before every poll and
 * between jobs, never in the middle of one, so jobs not yet started when it
 * fires are left on the queue untouched.
 */
export class ArtifactWorker {
  private state: WorkerState = "idle";
  private readonly totals: WorkerTotals = { processed: 0, errors: 0 };
  private readonly now: () => Date;

  constructor(private readonly deps: ArtifactWorkerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  getState(): WorkerState {
    return this.state;
  }

  getTotals(): WorkerTotals {
    return { ...this.totals };
  }

  async run(signal: AbortSignal): Promise<WorkerTotals> {
    if (this.state !== "idle") {
      throw new Error(`Worker cannot start from state ${this.state}.`);
    }

    this.deps.logger.info("Artifact worker starting", { ...this.deps.settings });

    while (!signal.aborted) {
      await this.pollCycle(signal);
    }

    this.state = "stopped";
    this.deps.logger.info("Artifact worker stopped", { ...this.totals });
    return this.getTotals();
  }

  async pollCycle(signal: AbortSignal): Promise<void> {
    const { batchSize, waitTimeSeconds, idleDelayMs, errorBackoffMs } = this.deps.settings;
    this.state = "polling";

    let jobs: ReceivedJob[];
    try {
      jobs = await this.deps.jobs.receive(batchSize, waitTimeSeconds);
    } catch (error) {
      this.deps.logger.error("Failed to poll job queue, backing off", { error, delayMs: errorBackoffMs });
      await pause(errorBackoffMs, signal);
      return;
    }

    if (jobs.length === 0) {
      await pause(idleDelayMs, signal);
      return;
    }

    this.deps.logger.info(`Received ${jobs.length} jobs`);
    this.state = "processing";

    for (const [index, job] of jobs.entries()) {
      if (signal.aborted) {
        this.deps.logger.info("Shutdown requested, leaving remaining jobs on the queue", {
          remaining: jobs.length - index,
        });
        break;
      }
      await this.handleJob(job);
    }

    this.state = "polling";
  }

  /**
   * Resolves `true` when the job was deleted from the queue.
   */
  async handleJob(job: ReceivedJob): Promise<boolean> {
    let parsed: SecondaryJob;
    try {
      parsed = decodeJob(job.body);
    } catch (error) {
      // Redelivery cannot fix a malformed body.
      this.totals.errors++;
      this.deps.logger.error("Dropping malformed job", {
        messageId: job.messageId,
        error,
        details: error instanceof MalformedInputError ? error.details : undefined,
      });
      await this.acknowledge(job);
      return false;
    }

    let found: boolean;
    try {
      found = await this.produceArtifact(parsed);
    } catch (error) {
      this.totals.errors++;
      this.deps.logger.error("Job failed, leaving it for redelivery", {
        messageId: job.messageId,
        recordId: parsed.recordId,
        error,
      });
      return false;
    }

    const deleted = await this.acknowledge(job);
    if (found && deleted) {
      this.totals.processed++;
      this.deps.logger.info("Job completed", { recordId: parsed.recordId });
    } else {
      this.totals.errors++;
    }
    return deleted;
  }

  /**
   * Upload first, then back-fill. Resolves `false` when the plan record no
   * longer exists; the artifact is then orphaned and the job dropped.
   */
  private async produceArtifact(job: SecondaryJob): Promise<boolean> {
    const generatedAt = this.now();
    const canvas = generateCanvas(job.emotion, job.recordId, generatedAt);

    this.deps.logger.info("Processing job", {
      recordId: job.recordId,
      emotion: job.emotion,
      template: canvas.template,
    });

    const url = await this.deps.blobs.putText(artifactKey(job.userId, job.recordId, generatedAt), canvas.body, {
      record_id: job.recordId,
      user_id: job.userId,
      template: canvas.template,
      generated_at: generatedAt.toISOString(),
    });

    const found = await this.deps.plans.markArtifactCompleted(
      job.userId,
      job.recordId,
      url,
      generatedAt.toISOString(),
    );
    if (!found) {
      this.deps.logger.warn("Plan record not found, dropping job", { recordId: job.recordId, userId: job.userId });
    }
    return found;
  }

  private async acknowledge(job: ReceivedJob): Promise<boolean> {
    try {
      await this.deps.jobs.acknowledge(job.receiptHandle);
      return true;
    } catch (error) {
      this.deps.logger.error("Failed to delete job, it will be redelivered", { messageId: job.messageId, error });
      return false;
    }
  }
}
