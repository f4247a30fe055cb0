import {
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SendMessageCommand,
  type Message,
  type SQSClient,
  type SendMessageCommandInput,
} from "@aws-sdk/client-sqs";
import type { Logger } from "./logger";
import { encodeJob, type SecondaryJob } from "./schemas";

export interface ReceivedJob {
  messageId: string;
  receiptHandle: string;
  body: string;
}

export interface JobDispatcher {
  /** Resolves `false` when the job could not be queued; never rejects. */
  enqueue(job: SecondaryJob): Promise<boolean>;
}

export interface JobSource {
  receive(maxJobs: number, waitTimeSeconds: number): Promise<ReceivedJob[]>;
  acknowledge(receiptHandle: string): Promise<void>;
}

export function isFifoQueue(queueUrl: string): boolean {
  return queueUrl.endsWith(".fifo");
}

export function buildSendInput(queueUrl: string, job: SecondaryJob): SendMessageCommandInput {
  const input: SendMessageCommandInput = {
    QueueUrl: queueUrl,
    MessageBody: encodeJob(job),
    MessageAttributes: {
      RecordId: { DataType: "String", StringValue: job.recordId },
      Emotion: { DataType: "String", StringValue: job.emotion },
    },
  };
  if (isFifoQueue(queueUrl)) {
    input.MessageGroupId = job.userId;
    input.MessageDeduplicationId = job.recordId;
  }
  return input;
}

/**
 * Messages without a receipt handle cannot be deleted, so they are skipped
 * and left to expire back onto the queue.
 */
export function toReceivedJobs(messages: Message[] | undefined, logger: Logger): ReceivedJob[] {
  const jobs: ReceivedJob[] = [];
  for (const message of messages ?? []) {
    if (!message.ReceiptHandle) {
      logger.warn("Received message without a receipt handle", { messageId: message.MessageId });
      continue;
    }
    jobs.push({
      messageId: message.MessageId ?? "unknown",
      receiptHandle: message.ReceiptHandle,
      body: message.Body ?? "",
    });
  }
  return jobs;
}

/**
 * Producer and consumer sides of the artifact job queue.
 */
export class SqsJobQueue implements JobDispatcher, JobSource {
  constructor(
    private readonly sqs: SQSClient,
    private readonly queueUrl: string,
    private readonly logger: Logger,
  ) {}

  async enqueue(job: SecondaryJob): Promise<boolean> {
    if (!this.queueUrl) {
      this.logger.warn("SQS_QUEUE_URL not configured, skipping artifact job", { recordId: job.recordId });
      return false;
    }

    try {
      await this.sqs.send(new SendMessageCommand(buildSendInput(this.queueUrl, job)));
      this.logger.info("Queued artifact job", { recordId: job.recordId, emotion: job.emotion });
      return true;
    } catch (error) {
      this.logger.error("Failed to queue artifact job", { recordId: job.recordId, error });
      return false;
    }
  }

  async receive(maxJobs: number, waitTimeSeconds: number): Promise<ReceivedJob[]> {
    const { Messages } = await this.sqs.send(
      new ReceiveMessageCommand({
        QueueUrl: this.queueUrl,
        MaxNumberOfMessages: maxJobs,
        WaitTimeSeconds: waitTimeSeconds,
        MessageAttributeNames: ["All"],
      }),
    );

    return toReceivedJobs(Messages, this.logger);
  }

  async acknowledge(receiptHandle: string): Promise<void> {
    await this.sqs.send(new DeleteMessageCommand({ QueueUrl: this.queueUrl, ReceiptHandle: receiptHandle }));
  }
}
