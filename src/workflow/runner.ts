import fs from "node:fs";
import path from "node:path";
import { DuplicateReleaseConflict, MailboxFailure, errorMessage, isArchiveError } from "../core/errors";
import { bodyText } from "../mailbox/body";
import { buildSearchCriteria } from "../mailbox/query";
import { Mailbox, SearchCriteria } from "../mailbox/types";
import { Logger, MetricsRegistry } from "../observability";
import { AttachmentPipeline, PipelineOutcome } from "../pipeline";
import { sanitizeForJson } from "../pipeline/slug";
import { Sink } from "../sink";
import { LedgerStore } from "../store";
import {
  CandidateMessage,
  FragmentGroup,
  ProcessingRecord,
  RawAttachment,
  RecordError,
  RecordErrorKind,
  RunSummary,
  WorkflowSpec,
} from "../types";
import { describeMismatch } from "./criteria";
import { ReleaseTarget, classifyRelease } from "./classifier";
import { FragmentMerger, fragmentToCandidate } from "./fragments";

export interface WorkflowRunnerDeps {
  workflow: WorkflowSpec;
  mailbox: Mailbox;
  store: LedgerStore;
  pipeline: AttachmentPipeline;
  sink: Sink;
  logger: Logger;
  metrics: MetricsRegistry;
  runId: string;
  now?: () => Date;
}

export interface RunOptions {
  force?: boolean;
  title?: string;
}

export interface ProcessOneTarget {
  uid?: number;
  messageId?: string;
}

interface ArchiveJob {
  primary: CandidateMessage;
  messages: CandidateMessage[];
  attachments: RawAttachment[];
  release: ReleaseTarget;
}

interface RawMessageEntry {
  uid?: number;
  messageId: string;
  subject: string;
  from: string;
  to?: string;
  date?: string;
}

interface RawDocument {
  workflow: string;
  releaseId: string;
  folderName: string;
  messages: RawMessageEntry[];
  body: string;
  attachments: string[];
  unhandled: string[];
  extractedText: Record<string, string>;
  archivedAt: string;
  runId: string;
}

export function emptySummary(): RunSummary {
  return { fetched: 0, dropped: 0, skipped: 0, archived: 0, failed: 0, pending: 0 };
}

function isRawDocument(value: unknown): value is RawDocument {
  return typeof value === "object" && value !== null && "messages" in value && Array.isArray(value.messages);
}

export class WorkflowRunner {
  private readonly workflow: WorkflowSpec;
  private readonly mailbox: Mailbox;
  private readonly store: LedgerStore;
  private readonly pipeline: AttachmentPipeline;
  private readonly sink: Sink;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly runId: string;
  private readonly now: () => Date;
  private readonly merger: FragmentMerger;

  constructor(deps: WorkflowRunnerDeps) {
    this.workflow = deps.workflow;
    this.mailbox = deps.mailbox;
    this.store = deps.store;
    this.pipeline = deps.pipeline;
    this.sink = deps.sink;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.runId = deps.runId;
    this.now = deps.now ?? (() => new Date());
    this.merger = new FragmentMerger(deps.store, deps.workflow);
  }

  get stagingRoot(): string {
    return path.join(this.workflow.archiveDir, `.staging-${this.runId}`);
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const resumeFrom =
      options.force || this.workflow.filters.afterDate ? undefined : await this.store.resumeDate(this.workflow.name);
    const criteria = buildSearchCriteria(this.workflow, { resumeFrom });

    this.logger.info("workflow_run_start", {
      workflow: this.workflow.name,
      force: Boolean(options.force),
      resumeFrom: resumeFrom?.toISOString(),
    });

    return this.execute(async (summary) => {
      await this.consume(criteria, summary, options, true);
      if (this.workflow.merge.enabled) {
        await this.finalizeGroups(summary, await this.merger.dueGroups(this.now()));
      }
    });
  }

  async processOne(target: ProcessOneTarget, options: RunOptions = {}): Promise<RunSummary> {
    const criteria = buildSearchCriteria(this.workflow, target);
    this.logger.info("workflow_process_one_start", {
      workflow: this.workflow.name,
      uid: target.uid,
      messageId: target.messageId,
      force: Boolean(options.force),
    });

    return this.execute(async (summary) => {
      await this.consume(criteria, summary, options, false);
      if (this.workflow.merge.enabled) {
        await this.finalizeGroups(summary, await this.merger.dueGroups(this.now()));
      }
    });
  }

  async finalizeOpenGroups(): Promise<RunSummary> {
    this.logger.info("workflow_finalize_start", { workflow: this.workflow.name });
    return this.execute(async (summary) => {
      await this.finalizeGroups(summary, await this.merger.openGroups());
    });
  }

  private async execute(body: (summary: RunSummary) => Promise<void>): Promise<RunSummary> {
    const summary = emptySummary();
    await this.store.startRun(this.runId, this.workflow.name, this.now().toISOString());

    try {
      await body(summary);
    } catch (error) {
      await this.store.finishRun(this.runId, "failed", this.now().toISOString(), summary);
      this.logger.error("workflow_run_failed", { workflow: this.workflow.name, error: errorMessage(error), ...summary });
      throw error;
    } finally {
      await fs.promises.rm(this.stagingRoot, { recursive: true, force: true });
    }

    await this.store.finishRun(this.runId, "completed", this.now().toISOString(), summary);
    this.logger.info("workflow_run_complete", { workflow: this.workflow.name, ...summary });
    return summary;
  }

  private async consume(criteria: SearchCriteria, summary: RunSummary, options: RunOptions, applyFilters: boolean): Promise<void> {
    const stopSearch = this.metrics.startTimer("mailbox_search_ms");
    const candidates = this.mailbox.search(criteria);
    let searchTimed = false;

    for await (const candidate of candidates) {
      if (!searchTimed) {
        stopSearch();
        searchTimed = true;
      }
      summary.fetched += 1;
      this.metrics.incrementCounter("candidates_fetched");

      const stopCandidate = this.metrics.startTimer("candidate_ms");
      try {
        await this.processCandidate(candidate, summary, options, applyFilters);
      } finally {
        stopCandidate();
      }
    }

    if (!searchTimed) {
      stopSearch();
    }
  }

  private async processCandidate(candidate: CandidateMessage, summary: RunSummary, options: RunOptions, applyFilters: boolean): Promise<void> {
    const fields = { workflow: this.workflow.name, messageId: candidate.messageId, uid: candidate.uid };

    if (applyFilters) {
      const mismatch = describeMismatch(candidate, this.workflow);
      if (mismatch) {
        summary.dropped += 1;
        this.metrics.incrementCounter("candidates_dropped");
        this.logger.debug("candidate_dropped", { ...fields, rule: mismatch, subject: candidate.subject });
        return;
      }
    }

    if (!options.force) {
      const status = await this.store.hasProcessed(this.workflow.name, candidate.messageId);
      if (status !== undefined && status !== "failed") {
        summary.skipped += 1;
        this.metrics.incrementCounter("candidates_skipped");
        this.logger.debug("candidate_already_processed", { ...fields, status });
        return;
      }
    }

    try {
      const classification = classifyRelease(candidate, this.workflow, { title: options.title });
      if (!classification.ok) {
        await this.commitFailure(summary, candidate, [candidate.messageId], "classification_failure", classification.failure.message);
        return;
      }
      const release = classification.release;

      if (this.workflow.merge.enabled) {
        const group = await this.merger.ingest(candidate, release, this.now());
        await this.commit(summary, {
          ...this.baseRecord(candidate, [candidate.messageId]),
          status: "pending",
          releaseId: release.releaseId,
        });
        this.logger.info("fragment_ingested", {
          ...fields,
          releaseId: release.releaseId,
          fragments: group.fragments.length,
          complete: group.complete,
        });
        return;
      }

      const conflict = await this.findDuplicateRelease([candidate.messageId], release.releaseId);
      if (conflict) {
        await this.commit(summary, {
          ...this.baseRecord(candidate, [candidate.messageId]),
          status: "skipped",
          releaseId: release.releaseId,
          error: { kind: conflict.kind, message: conflict.message },
        });
        return;
      }

      const attachments = await this.mailbox.fetchAttachments(candidate, this.workflow.mailboxFolder);
      await this.archive(summary, { primary: candidate, messages: [candidate], attachments, release });
    } catch (error) {
      if (error instanceof MailboxFailure) {
        throw error;
      }
      const kind: RecordErrorKind = isArchiveError(error) && error.kind === "handler_failure" ? "handler_failure" : "unexpected";
      this.logger.error("candidate_unexpected_error", { ...fields, error: errorMessage(error) });
      await this.commitFailure(summary, candidate, [candidate.messageId], kind, errorMessage(error));
    }
  }

  // Another archived record of the same release, sharing none of these messages, is a conflict.
  private async findDuplicateRelease(messageIds: string[], releaseId: string): Promise<DuplicateReleaseConflict | undefined> {
    if (this.workflow.release.collectionType === "playlist" || this.workflow.release.onDuplicate === "overwrite") {
      return undefined;
    }
    const existing = await this.store.findByRelease(this.workflow.name, releaseId);
    const other = existing.find(
      (record) =>
        record.status === "archived" &&
        !messageIds.some((id) => id === record.messageId || record.memberMessageIds.includes(id)),
    );
    if (!other) {
      return undefined;
    }
    this.logger.warn("duplicate_release_flagged", {
      workflow: this.workflow.name,
      messageId: messageIds[0],
      releaseId,
      existingMessageId: other.messageId,
    });
    return new DuplicateReleaseConflict(releaseId, other.messageId);
  }

  private async finalizeGroups(summary: RunSummary, groups: FragmentGroup[]): Promise<void> {
    for (const group of groups) {
      const memberIds = group.fragments.map((fragment) => fragment.messageId);
      const conflict = await this.findDuplicateRelease(memberIds, group.releaseId);
      if (conflict) {
        for (const fragment of group.fragments) {
          await this.commit(summary, {
            ...this.baseRecord(fragmentToCandidate(fragment), [fragment.messageId]),
            status: "skipped",
            releaseId: group.releaseId,
            error: { kind: conflict.kind, message: conflict.message },
          });
        }
        await this.merger.discard(group);
        continue;
      }

      const merged = await this.merger.collect(group, this.mailbox);
      const [primary] = merged.candidates;
      if (!primary) {
        await this.merger.discard(group);
        continue;
      }

      this.logger.info("fragment_group_finalizing", {
        workflow: this.workflow.name,
        releaseId: group.releaseId,
        fragments: memberIds.length,
        attachments: merged.attachments.length,
      });

      try {
        await this.archive(summary, {
          primary,
          messages: merged.candidates,
          attachments: merged.attachments,
          release: { releaseId: group.releaseId, folderName: group.folderName },
        });
      } catch (error) {
        this.logger.error("fragment_group_failed", { workflow: this.workflow.name, releaseId: group.releaseId, error: errorMessage(error) });
        await this.commitFailure(summary, primary, memberIds, "unexpected", errorMessage(error), group.releaseId);
      }
      await this.merger.discard(group);
    }
  }

  private async archive(summary: RunSummary, job: ArchiveJob): Promise<void> {
    const memberIds = job.messages.map((message) => message.messageId);
    const stagingDir = path.join(this.stagingRoot, job.release.folderName);
    const finalDir = path.join(this.workflow.archiveDir, job.release.folderName);

    await fs.promises.rm(stagingDir, { recursive: true, force: true });
    await fs.promises.mkdir(stagingDir, { recursive: true });

    let outcome: PipelineOutcome;
    try {
      outcome = await this.pipeline.process(job.attachments, this.workflow, stagingDir);
    } catch (error) {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
      throw error;
    }

    if (outcome.status !== "ok") {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
      const error: RecordError = {
        kind: "handler_failure",
        message: `${outcome.failures.length} attachment(s) failed (${outcome.status}); ${outcome.results.length} processed attachment(s) not published`,
        details: outcome.failures,
      };
      await this.commit(summary, {
        ...this.baseRecord(job.primary, memberIds),
        status: "failed",
        releaseId: job.release.releaseId,
        attachments: outcome.results,
        unhandled: outcome.unhandled,
        error,
      });
      return;
    }

    try {
      await this.writeRawDocument(stagingDir, finalDir, job, outcome);
      await this.publishRelease(stagingDir, finalDir);
    } catch (error) {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
      throw error;
    }

    await this.commit(summary, {
      ...this.baseRecord(job.primary, memberIds),
      status: "archived",
      releaseId: job.release.releaseId,
      destinationPath: finalDir,
      attachments: outcome.results,
      unhandled: outcome.unhandled,
    });
  }

  private async writeRawDocument(stagingDir: string, finalDir: string, job: ArchiveJob, outcome: PipelineOutcome): Promise<void> {
    const messages: RawMessageEntry[] = job.messages.map((message) => ({
      uid: message.uid,
      messageId: message.messageId,
      subject: message.subject,
      from: message.from,
      to: message.to,
      date: message.date?.toISOString(),
    }));
    const body = job.messages
      .map((message) => sanitizeForJson(bodyText(message)))
      .filter((text) => text.length > 0)
      .join("\n\n");

    let document: RawDocument = {
      workflow: this.workflow.name,
      releaseId: job.release.releaseId,
      folderName: job.release.folderName,
      messages,
      body,
      attachments: outcome.results.map((result) => result.path),
      unhandled: outcome.unhandled,
      extractedText: outcome.extractedText,
      archivedAt: this.now().toISOString(),
      runId: this.runId,
    };

    if (this.workflow.release.collectionType === "playlist") {
      const previous = await this.readRawDocument(finalDir);
      if (previous) {
        const incoming = new Set(messages.map((message) => message.messageId));
        document = {
          ...document,
          messages: [...previous.messages.filter((message) => !incoming.has(message.messageId)), ...messages],
          body: [previous.body, body].filter((text) => text.length > 0).join("\n\n"),
          attachments: [...new Set([...previous.attachments, ...document.attachments])],
          unhandled: [...new Set([...previous.unhandled, ...document.unhandled])],
          extractedText: { ...previous.extractedText, ...document.extractedText },
        };
      }
    }

    await fs.promises.writeFile(path.join(stagingDir, "raw.json"), JSON.stringify(document, null, 2) + "\n", "utf-8");
  }

  private async readRawDocument(dir: string): Promise<RawDocument | undefined> {
    let content: string;
    try {
      content = await fs.promises.readFile(path.join(dir, "raw.json"), "utf-8");
    } catch {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(content);
      return isRawDocument(parsed) ? parsed : undefined;
    } catch (error) {
      this.logger.warn("raw_document_unreadable", { path: dir, error: errorMessage(error) });
      return undefined;
    }
  }

  // Playlists accumulate into one folder; every other collection replaces its release folder.
  private async publishRelease(stagingDir: string, finalDir: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(finalDir), { recursive: true });

    if (this.workflow.release.collectionType === "playlist") {
      await fs.promises.mkdir(finalDir, { recursive: true });
      await fs.promises.cp(stagingDir, finalDir, { recursive: true, force: true });
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
      return;
    }

    await fs.promises.rm(finalDir, { recursive: true, force: true });
    await fs.promises.rename(stagingDir, finalDir);
  }

  private baseRecord(candidate: CandidateMessage, memberMessageIds: string[]): ProcessingRecord {
    return {
      workflow: this.workflow.name,
      messageId: candidate.messageId,
      status: "pending",
      uid: candidate.uid,
      subject: candidate.subject,
      messageDate: candidate.date?.toISOString(),
      processedAt: this.now().toISOString(),
      runId: this.runId,
      memberMessageIds,
      attachments: [],
      unhandled: [],
    };
  }

  private async commitFailure(
    summary: RunSummary,
    candidate: CandidateMessage,
    memberMessageIds: string[],
    kind: RecordErrorKind,
    message: string,
    releaseId?: string,
  ): Promise<void> {
    await this.commit(summary, {
      ...this.baseRecord(candidate, memberMessageIds),
      status: "failed",
      releaseId,
      error: { kind, message },
    });
  }

  private async commit(summary: RunSummary, record: ProcessingRecord): Promise<void> {
    await this.store.record(record);

    switch (record.status) {
      case "archived":
        summary.archived += 1;
        this.metrics.incrementCounter("records_archived");
        this.logger.info("candidate_archived", {
          workflow: record.workflow,
          messageId: record.messageId,
          releaseId: record.releaseId,
          attachments: record.attachments.length,
          unhandled: record.unhandled.length,
        });
        break;
      case "failed":
        summary.failed += 1;
        this.metrics.incrementCounter("records_failed");
        this.logger.warn("candidate_failed", {
          workflow: record.workflow,
          messageId: record.messageId,
          releaseId: record.releaseId,
          errorKind: record.error?.kind,
          error: record.error?.message,
        });
        break;
      case "pending":
        summary.pending += 1;
        this.metrics.incrementCounter("records_pending");
        break;
      case "skipped":
        summary.skipped += 1;
        this.metrics.incrementCounter("candidates_skipped");
        break;
    }

    try {
      await this.sink.publishRecords([record]);
    } catch (error) {
      this.logger.error("sink_publish_failed", { workflow: record.workflow, messageId: record.messageId, error: errorMessage(error) });
    }
  }
}
