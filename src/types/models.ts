export interface AttachmentInfo {
  filename: string;
  contentType?: string;
  size: number;
}

export interface RawAttachment {
  filename: string;
  contentType?: string;
  content: Buffer;
}

export interface CandidateMessage {
  uid?: number;
  messageId: string;
  subject: string;
  from: string;
  to?: string;
  date?: Date;
  textBody?: string;
  htmlBody?: string;
  attachments: AttachmentInfo[];
}

export type ProcessingStatus = "pending" | "archived" | "skipped" | "failed";

export type AttachmentKind = "audio" | "document" | "image" | "file";

export interface AttachmentResult {
  original: string;
  slugified: string;
  bytes: number;
  handler: string;
  path: string;
  kind: AttachmentKind;
  metadata?: Record<string, unknown>;
}

export interface AttachmentFailure {
  filename: string;
  handler: string;
  message: string;
}

export type RecordErrorKind =
  | "classification_failure"
  | "handler_failure"
  | "duplicate_release_conflict"
  | "unexpected";

export interface RecordError {
  kind: RecordErrorKind;
  message: string;
  details?: AttachmentFailure[];
}

export interface ProcessingRecord {
  workflow: string;
  messageId: string;
  status: ProcessingStatus;
  uid?: number;
  releaseId?: string;
  destinationPath?: string;
  subject?: string;
  messageDate?: string;
  processedAt: string;
  runId?: string;
  memberMessageIds: string[];
  attachments: AttachmentResult[];
  unhandled: string[];
  error?: RecordError;
}

export interface FragmentEntry {
  messageId: string;
  uid?: number;
  subject: string;
  from: string;
  date?: string;
}

export interface FragmentGroup {
  workflow: string;
  releaseId: string;
  folderName: string;
  fragments: FragmentEntry[];
  firstSeenAt: string;
  lastFragmentAt: string;
  complete: boolean;
}

export interface RunSummary {
  fetched: number;
  dropped: number;
  skipped: number;
  archived: number;
  failed: number;
  pending: number;
}
