export type ArchiveErrorKind =
  | "classification_failure"
  | "handler_failure"
  | "duplicate_release_conflict"
  | "mailbox_failure"
  | "config_error"
  | "unknown_workflow";

const MAX_MESSAGE_CHARS = 500;

export abstract class ArchiveError extends Error {
  abstract readonly kind: ArchiveErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ClassificationFailure extends ArchiveError {
  readonly kind = "classification_failure" as const;
  readonly subject: string;
  readonly patterns: string[];

  constructor(subject: string, patterns: string[], reason?: string) {
    super(reason ?? `No release number found in "${subject}" (tried ${patterns.map((p) => `/${p}/`).join(", ")})`);
    this.subject = subject;
    this.patterns = patterns;
  }
}

export class HandlerFailure extends ArchiveError {
  readonly kind = "handler_failure" as const;
  readonly filename: string;
  readonly handler: string;

  constructor(filename: string, handler: string, cause: unknown) {
    super(`${handler} failed on ${filename}: ${errorMessage(cause)}`, { cause });
    this.filename = filename;
    this.handler = handler;
  }
}

export class DuplicateReleaseConflict extends ArchiveError {
  readonly kind = "duplicate_release_conflict" as const;
  readonly releaseId: string;
  readonly existingMessageId: string;

  constructor(releaseId: string, existingMessageId: string) {
    super(`Release ${releaseId} is already archived from message ${existingMessageId}`);
    this.releaseId = releaseId;
    this.existingMessageId = existingMessageId;
  }
}

export class MailboxFailure extends ArchiveError {
  readonly kind = "mailbox_failure" as const;

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, { cause });
  }
}

export class ConfigError extends ArchiveError {
  readonly kind = "config_error" as const;
}

export class UnknownWorkflowError extends ArchiveError {
  readonly kind = "unknown_workflow" as const;
  readonly workflow: string;

  constructor(workflow: string, available: string[]) {
    super(`Unknown workflow: ${workflow}. Available: ${available.join(", ") || "(none)"}`);
    this.workflow = workflow;
  }
}

export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError;
}

export function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.length > MAX_MESSAGE_CHARS ? `${message.slice(0, MAX_MESSAGE_CHARS)}…` : message;
}
