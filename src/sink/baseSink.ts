import { ProcessingRecord } from "../types";
import { RecordEvent, Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishRecords(records: ProcessingRecord[]): Promise<void>;

  protected ensureConfigured(name: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`${name} sink is not configured`);
    }
    return value;
  }

  protected toEvent(record: ProcessingRecord, sentAt: string): RecordEvent {
    const key = `${record.workflow}:${record.messageId}`;
    return {
      type: `record.${record.status}`,
      key,
      idempotencyKey: `${key}:${record.status}`,
      workflow: record.workflow,
      releaseId: record.releaseId,
      sentAt,
      record,
    };
  }
}

export class NoopSink extends BaseSink {
  async publishRecords(): Promise<void> {
    return;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
