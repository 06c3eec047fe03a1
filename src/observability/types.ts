export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  workflow?: string;
  messageId?: string;
  uid?: number;
  releaseId?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "candidates_fetched"
  | "candidates_dropped"
  | "candidates_skipped"
  | "records_archived"
  | "records_failed"
  | "records_pending"
  | "attachments_handled"
  | "attachments_failed";

export type MetricTimerName = "mailbox_search_ms" | "candidate_ms" | "handler_ms";
