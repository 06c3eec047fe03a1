import path from "node:path";
import { minimatch } from "minimatch";
import { HandlerFailure, errorMessage } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { AttachmentFailure, AttachmentResult, ProcessorSpec, RawAttachment, WorkflowSpec } from "../types";
import { saveAttachment, stringOption, toResult } from "./handlers/common";
import { HandlerRegistry } from "./registry";
import { DispatchOptions, HandlerContext, PipelineStatus } from "./types";

export interface PipelineOutcome {
  status: PipelineStatus;
  results: AttachmentResult[];
  failures: AttachmentFailure[];
  unhandled: string[];
  extractedText: Record<string, string>;
}

const NO_EXCLUSIONS: ReadonlySet<string> = new Set();

export function matchesPatterns(filename: string, patterns: readonly string[]): boolean {
  const name = filename.toLowerCase();
  return patterns.some((pattern) => minimatch(name, pattern.toLowerCase(), { nocase: true, dot: true }));
}

export function selectProcessor(
  filename: string,
  processors: readonly ProcessorSpec[],
  excludeHandlers: ReadonlySet<string> = NO_EXCLUSIONS,
): ProcessorSpec | undefined {
  return processors.find((processor) => !excludeHandlers.has(processor.handler) && matchesPatterns(filename, processor.patterns));
}

function defaultSubdir(kind: string): string {
  return kind === "image" ? "images" : "audio";
}

export class AttachmentPipeline {
  private readonly registry: HandlerRegistry;
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;

  constructor(registry: HandlerRegistry, logger: Logger, metrics?: MetricsRegistry) {
    this.registry = registry;
    this.logger = logger;
    this.metrics = metrics;
  }

  async process(
    attachments: RawAttachment[],
    workflow: WorkflowSpec,
    releaseDir: string,
    extractedText: Record<string, string> = {},
  ): Promise<PipelineOutcome> {
    const results: AttachmentResult[] = [];
    const failures: AttachmentFailure[] = [];
    const unhandled: string[] = [];
    let handledCount = 0;

    const context: HandlerContext = {
      workflow,
      releaseDir,
      extractedText,
      logger: this.logger,
      dispatch: (attachment, options) => this.dispatchNested(attachment, options, context, failures),
    };

    for (const attachment of attachments) {
      const processor = selectProcessor(attachment.filename, workflow.processors);
      if (!processor) {
        unhandled.push(attachment.filename);
        await saveAttachment(attachment, path.join(releaseDir, "unhandled"));
        this.logger.warn("attachment_unhandled", { workflow: workflow.name, filename: attachment.filename });
        continue;
      }

      handledCount += 1;
      const handler = this.registry.get(processor.handler);
      const targetDir = path.join(releaseDir, stringOption(processor.options, "subdir") ?? defaultSubdir(handler.kind));
      const handled = await this.runHandler(processor, attachment, targetDir, context, failures);
      this.metrics?.incrementCounter("attachments_handled", handled.length);
      results.push(...handled);
    }

    const status: PipelineStatus = failures.length === 0 ? "ok" : results.length === 0 && handledCount > 0 ? "failed" : "partial";
    return { status, results, failures, unhandled, extractedText };
  }

  private async dispatchNested(
    attachment: RawAttachment,
    options: DispatchOptions,
    context: HandlerContext,
    failures: AttachmentFailure[],
  ): Promise<AttachmentResult[]> {
    const processor = selectProcessor(attachment.filename, context.workflow.processors, options.excludeHandlers);
    if (!processor) {
      const saved = await saveAttachment(attachment, options.targetDir);
      return [await toResult(saved, "save_file", "file", context.releaseDir)];
    }
    return this.runHandler(processor, attachment, options.targetDir, context, failures);
  }

  private async runHandler(
    processor: ProcessorSpec,
    attachment: RawAttachment,
    targetDir: string,
    context: HandlerContext,
    failures: AttachmentFailure[],
  ): Promise<AttachmentResult[]> {
    const handler = this.registry.get(processor.handler);
    const stopTimer = this.metrics?.startTimer("handler_ms");
    try {
      return await handler.handle(attachment, targetDir, processor.options, context);
    } catch (error) {
      const failure = new HandlerFailure(attachment.filename, processor.handler, error);
      failures.push({ filename: attachment.filename, handler: processor.handler, message: errorMessage(error) });
      this.metrics?.incrementCounter("attachments_failed");
      this.logger.error("attachment_handler_failed", {
        workflow: context.workflow.name,
        filename: attachment.filename,
        handler: processor.handler,
        error: failure.message,
      });
      return [];
    } finally {
      stopTimer?.();
    }
  }
}
