import { Logger } from "../observability";
import { AttachmentKind, AttachmentResult, HandlerOptions, RawAttachment, WorkflowSpec } from "../types";

export interface DispatchOptions {
  targetDir: string;
  excludeHandlers: ReadonlySet<string>;
}

export interface HandlerContext {
  workflow: WorkflowSpec;
  releaseDir: string;
  extractedText: Record<string, string>;
  logger: Logger;
  // Routes a nested file (e.g. a zip entry) through the workflow's processors.
  dispatch(attachment: RawAttachment, options: DispatchOptions): Promise<AttachmentResult[]>;
}

export interface AttachmentHandler {
  readonly name: string;
  readonly kind: AttachmentKind;
  handle(attachment: RawAttachment, targetDir: string, options: HandlerOptions, context: HandlerContext): Promise<AttachmentResult[]>;
}

export type PipelineStatus = "ok" | "partial" | "failed";
