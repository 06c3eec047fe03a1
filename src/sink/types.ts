import { ProcessingRecord, ProcessingStatus } from "../types";

export type RecordEventType = `record.${ProcessingStatus}`;

// Wire shape shared by the remote sinks.
export interface RecordEvent {
  type: RecordEventType;
  key: string;
  idempotencyKey: string;
  workflow: string;
  releaseId?: string;
  sentAt: string;
  record: ProcessingRecord;
}

export interface Sink {
  publishRecords(records: ProcessingRecord[]): Promise<void>;
}
