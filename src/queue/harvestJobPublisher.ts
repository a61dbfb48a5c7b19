import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import { sleep as defaultSleep, type SleepFn } from "../core/retry";
import type { HarvestJobInput } from "./harvestJobs";

export interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface HarvestJobPublisherOptions {
  queueUrl: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: SleepFn;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
}

export const BATCH_LIMIT = 10;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class HarvestJobPublisher {
  private readonly queueUrl: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: SleepFn;

  constructor(options: HarvestJobPublisherOptions) {
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? this.queueUrl.endsWith(".fifo");
    this.groupId = options.groupId ?? "harvest-jobs";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Sends one message per job and returns how many were accepted. */
  async publish(jobs: HarvestJobInput[]): Promise<number> {
    const entries = jobs.map((job, index) => {
      const entry: BatchEntry = {
        Id: String(index),
        MessageBody: JSON.stringify(job),
      };

      if (this.fifo) {
        entry.MessageGroupId = this.groupId;
        entry.MessageDeduplicationId = `${job.collection}:${job.date}`;
      }

      return entry;
    });

    for (const entryBatch of chunk(entries, BATCH_LIMIT)) {
      await this.sendBatchWithRetries(entryBatch);
    }
    return entries.length;
  }

  private async sendBatchWithRetries(originalEntries: BatchEntry[]): Promise<void> {
    let pendingEntries = [...originalEntries];
    let attempt = 0;

    while (pendingEntries.length > 0) {
      attempt += 1;
      const command = new SendMessageBatchCommand({
        QueueUrl: this.queueUrl,
        Entries: pendingEntries,
      });
      const response = await this.client.send(command);

      const failedIds = new Set((response.Failed ?? []).map((f) => f.Id).filter((id): id is string => Boolean(id)));
      if (failedIds.size === 0) {
        return;
      }

      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failedIds.size} entries still failed)`);
      }

      pendingEntries = pendingEntries.filter((entry) => failedIds.has(entry.Id));
      await this.sleep(this.retryDelayMs * attempt);
    }
  }
}
