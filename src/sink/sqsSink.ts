import { createHash } from "node:crypto";
import { SendMessageBatchCommand, SendMessageBatchRequestEntry, SQSClient } from "@aws-sdk/client-sqs";
import { ProcessingRecord } from "../types";
import { BaseSink, sleep } from "./baseSink";
import { RecordEvent } from "./types";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupPrefix?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

const BATCH_LIMIT = 10;

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupPrefix: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(optionsOrQueueUrl?: SqsSinkOptions | string) {
    super();
    const options: SqsSinkOptions =
      typeof optionsOrQueueUrl === "string" ? { queueUrl: optionsOrQueueUrl } : (optionsOrQueueUrl ?? {});

    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupPrefix = options.groupPrefix ?? "mail-archiver";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async publishRecords(records: ProcessingRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const queueUrl = this.ensureConfigured("SQS", this.queueUrl);
    const sentAt = new Date().toISOString();
    const entries = records.map((record, index) => this.toEntry(this.toEvent(record, sentAt), index));

    for (let start = 0; start < entries.length; start += BATCH_LIMIT) {
      await this.sendBatch(queueUrl, entries.slice(start, start + BATCH_LIMIT));
    }
  }

  // FIFO ordering is per workflow; dedup ids change with the record status.
  private toEntry(event: RecordEvent, index: number): SendMessageBatchRequestEntry {
    const entry: SendMessageBatchRequestEntry = {
      Id: String(index),
      MessageBody: JSON.stringify(event),
      MessageAttributes: {
        workflow: { DataType: "String", StringValue: event.workflow },
        eventType: { DataType: "String", StringValue: event.type },
      },
    };
    if (this.fifo) {
      entry.MessageGroupId = `${this.groupPrefix}.${event.workflow}`;
      entry.MessageDeduplicationId = createHash("sha256").update(event.idempotencyKey).digest("hex");
    }
    return entry;
  }

  private async sendBatch(queueUrl: string, batch: SendMessageBatchRequestEntry[]): Promise<void> {
    let pending = batch;
    for (let attempt = 1; pending.length > 0; attempt += 1) {
      const response = await this.client.send(new SendMessageBatchCommand({ QueueUrl: queueUrl, Entries: pending }));
      const failedIds = new Set((response.Failed ?? []).flatMap((failure) => (failure.Id ? [failure.Id] : [])));
      if (failedIds.size === 0) {
        return;
      }
      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after ${attempt} attempt(s) (${failedIds.size} entries still failed)`);
      }
      pending = pending.filter((entry) => entry.Id !== undefined && failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
