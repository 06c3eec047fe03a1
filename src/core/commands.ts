import { AppConfig, findWorkflow } from "../config";
import { Mailbox } from "../mailbox/types";
import { Logger, MetricsRegistry } from "../observability";
import { AttachmentPipeline, HandlerRegistry } from "../pipeline";
import { Sink } from "../sink";
import { ClearTarget, LedgerStore } from "../store";
import { RunSummary, WorkflowSpec } from "../types";
import { ProcessOneTarget, RunOptions, WorkflowRunner } from "../workflow";
import { MailboxFailure } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: LedgerStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  registry: HandlerRegistry;
  openMailbox: () => Mailbox;
  print?: (line: string) => void;
}

function print(ctx: CommandContext, line: string): void {
  (ctx.print ?? console.log)(line);
}

async function withRunner<T>(ctx: CommandContext, workflow: WorkflowSpec, body: (runner: WorkflowRunner) => Promise<T>): Promise<T> {
  const mailbox = ctx.openMailbox();
  const runner = new WorkflowRunner({
    workflow,
    mailbox,
    store: ctx.store,
    pipeline: new AttachmentPipeline(ctx.registry, ctx.logger.child("pipeline", workflow.name), ctx.metrics),
    sink: ctx.sink,
    logger: ctx.logger.child("runner", workflow.name),
    metrics: ctx.metrics,
    runId: ctx.runId,
  });
  try {
    return await body(runner);
  } finally {
    await mailbox.close();
  }
}

export function runList(ctx: CommandContext): void {
  if (ctx.config.workflows.length === 0) {
    print(ctx, "No workflows configured.");
    return;
  }
  for (const workflow of ctx.config.workflows) {
    print(ctx, `${workflow.name}\t${workflow.description}`);
  }
}

export function runShow(ctx: CommandContext, workflowName: string): void {
  const workflow = findWorkflow(ctx.config.workflows, workflowName);
  print(ctx, JSON.stringify(workflow, null, 2));
}

export async function runWorkflow(ctx: CommandContext, workflowName: string, options: RunOptions): Promise<RunSummary> {
  const workflow = findWorkflow(ctx.config.workflows, workflowName);
  ctx.logger.info("run_start", { workflow: workflow.name, force: Boolean(options.force), title: options.title });
  const summary = await withRunner(ctx, workflow, (runner) => runner.run(options));
  ctx.logger.info("run_complete", { workflow: workflow.name, ...summary });
  return summary;
}

export async function runProcessOne(
  ctx: CommandContext,
  workflowName: string,
  target: ProcessOneTarget,
  options: RunOptions,
): Promise<RunSummary> {
  const workflow = findWorkflow(ctx.config.workflows, workflowName);
  const summary = await withRunner(ctx, workflow, (runner) => runner.processOne(target, options));
  if (summary.fetched === 0) {
    const label = target.uid !== undefined ? `UID ${target.uid}` : `Message-ID ${target.messageId ?? ""}`;
    throw new MailboxFailure(`No message with ${label} in ${workflow.mailboxFolder}`);
  }
  ctx.logger.info("process_one_complete", { workflow: workflow.name, ...summary });
  return summary;
}

export async function runFinalize(ctx: CommandContext, workflowName: string): Promise<RunSummary> {
  const workflow = findWorkflow(ctx.config.workflows, workflowName);
  const summary = await withRunner(ctx, workflow, (runner) => runner.finalizeOpenGroups());
  ctx.logger.info("finalize_complete", { workflow: workflow.name, ...summary });
  return summary;
}

export async function runClear(ctx: CommandContext, workflowName: string, target: ClearTarget): Promise<number> {
  const workflow = findWorkflow(ctx.config.workflows, workflowName);
  const removed = await ctx.store.forceClear(workflow.name, target);
  ctx.logger.info("clear_complete", { workflow: workflow.name, ...target, removed });
  print(ctx, `Removed ${removed} record(s) from ${workflow.name}.`);
  return removed;
}

export async function runStatus(ctx: CommandContext, workflowName: string): Promise<void> {
  const workflow = findWorkflow(ctx.config.workflows, workflowName);
  ctx.logger.info("status_start", { workflow: workflow.name });
  const stats = await ctx.store.getStats(workflow.name);
  print(ctx, JSON.stringify({ workflow: workflow.name, ...stats }, null, 2));
  ctx.logger.info("status_complete", { workflow: workflow.name, stats });
}
