import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  AttachmentFailure,
  AttachmentResult,
  FragmentEntry,
  FragmentGroup,
  ProcessingRecord,
  ProcessingStatus,
  RecordErrorKind,
  RunSummary,
} from "../types";
import { ClearTarget, LedgerStats, LedgerStore, resumeDateFrom } from "./types";

type RecordRow = {
  workflow: string;
  messageId: string;
  status: ProcessingStatus;
  uid: number | null;
  releaseId: string | null;
  destinationPath: string | null;
  subject: string | null;
  messageDate: string | null;
  processedAt: string;
  runId: string | null;
  attachmentsJson: string;
  unhandledJson: string;
  errorKind: RecordErrorKind | null;
  errorMessage: string | null;
  errorDetailsJson: string | null;
};

type FragmentGroupRow = {
  workflow: string;
  releaseId: string;
  folderName: string;
  fragmentsJson: string;
  firstSeenAt: string;
  lastFragmentAt: string;
  complete: number;
};

type ResumeRow = {
  latestArchived: string | null;
  oldestFailed: string | null;
  undatedFailures: number | null;
};

const RECORD_COLUMNS = `
  workflow, messageId, status, uid, releaseId, destinationPath, subject, messageDate,
  processedAt, runId, attachmentsJson, unhandledJson, errorKind, errorMessage, errorDetailsJson
`;

function parseJson<T>(value: string | null, fallback: T): T {
  if (!value) {
    return fallback;
  }
  return JSON.parse(value) as T;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, workflow: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, workflow, startedAt, finishedAt, status, summaryJson)
        VALUES (@runId, @workflow, @startedAt, NULL, 'running', NULL)
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, workflow, startedAt });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string, summary?: RunSummary): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          summaryJson = @summaryJson
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
        summaryJson: summary ? JSON.stringify(summary) : null,
      });
  }

  async hasProcessed(workflow: string, messageId: string): Promise<ProcessingStatus | undefined> {
    return this.findRow(workflow, messageId)?.status;
  }

  async getRecord(workflow: string, messageId: string): Promise<ProcessingRecord | undefined> {
    const row = this.findRow(workflow, messageId);
    return row ? this.toRecord(row) : undefined;
  }

  async record(record: ProcessingRecord): Promise<void> {
    const upsert = this.db.prepare(`
      INSERT INTO records (${RECORD_COLUMNS})
      VALUES (
        @workflow, @messageId, @status, @uid, @releaseId, @destinationPath, @subject, @messageDate,
        @processedAt, @runId, @attachmentsJson, @unhandledJson, @errorKind, @errorMessage, @errorDetailsJson
      )
      ON CONFLICT(workflow, messageId) DO UPDATE SET
        status = excluded.status,
        uid = COALESCE(excluded.uid, records.uid),
        releaseId = excluded.releaseId,
        destinationPath = excluded.destinationPath,
        subject = excluded.subject,
        messageDate = excluded.messageDate,
        processedAt = excluded.processedAt,
        runId = excluded.runId,
        attachmentsJson = excluded.attachmentsJson,
        unhandledJson = excluded.unhandledJson,
        errorKind = excluded.errorKind,
        errorMessage = excluded.errorMessage,
        errorDetailsJson = excluded.errorDetailsJson
    `);
    const deleteMembers = this.db.prepare("DELETE FROM record_members WHERE workflow = ? AND messageId = ?");
    const deleteSuperseded = this.db.prepare("DELETE FROM records WHERE workflow = ? AND messageId = ?");
    const insertMember = this.db.prepare(`
      INSERT INTO record_members (workflow, memberMessageId, messageId)
      VALUES (?, ?, ?)
      ON CONFLICT(workflow, memberMessageId) DO UPDATE SET messageId = excluded.messageId
    `);

    const tx = this.db.transaction((entry: ProcessingRecord) => {
      upsert.run({
        workflow: entry.workflow,
        messageId: entry.messageId,
        status: entry.status,
        uid: entry.uid ?? null,
        releaseId: entry.releaseId ?? null,
        destinationPath: entry.destinationPath ?? null,
        subject: entry.subject ?? null,
        messageDate: entry.messageDate ?? null,
        processedAt: entry.processedAt,
        runId: entry.runId ?? null,
        attachmentsJson: JSON.stringify(entry.attachments),
        unhandledJson: JSON.stringify(entry.unhandled),
        errorKind: entry.error?.kind ?? null,
        errorMessage: entry.error?.message ?? null,
        errorDetailsJson: entry.error?.details ? JSON.stringify(entry.error.details) : null,
      });
      deleteMembers.run(entry.workflow, entry.messageId);
      for (const member of entry.memberMessageIds) {
        if (member !== entry.messageId) {
          deleteSuperseded.run(entry.workflow, member);
          deleteMembers.run(entry.workflow, member);
        }
        insertMember.run(entry.workflow, member, entry.messageId);
      }
    });
    tx(record);
  }

  async forceClear(workflow: string, target: ClearTarget): Promise<number> {
    const keys =
      "messageId" in target
        ? [this.findRow(workflow, target.messageId)?.messageId].filter((key): key is string => Boolean(key))
        : (
            this.db
              .prepare("SELECT messageId FROM records WHERE workflow = ? AND releaseId = ?")
              .all(workflow, target.releaseId) as Array<{ messageId: string }>
          ).map((row) => row.messageId);

    const deleteRecord = this.db.prepare("DELETE FROM records WHERE workflow = ? AND messageId = ?");
    const deleteMembers = this.db.prepare("DELETE FROM record_members WHERE workflow = ? AND messageId = ?");
    const deleteGroup = this.db.prepare("DELETE FROM fragment_groups WHERE workflow = ? AND releaseId = ?");

    const tx = this.db.transaction(() => {
      for (const key of keys) {
        deleteRecord.run(workflow, key);
        deleteMembers.run(workflow, key);
      }
      if ("releaseId" in target) {
        deleteGroup.run(workflow, target.releaseId);
      }
    });
    tx();

    return keys.length;
  }

  async listRecords(workflow: string): Promise<ProcessingRecord[]> {
    const rows = this.db
      .prepare(`SELECT ${RECORD_COLUMNS} FROM records WHERE workflow = ? ORDER BY processedAt ASC, messageId ASC`)
      .all(workflow) as RecordRow[];
    return rows.map((row) => this.toRecord(row));
  }

  async findByRelease(workflow: string, releaseId: string): Promise<ProcessingRecord[]> {
    const rows = this.db
      .prepare(`SELECT ${RECORD_COLUMNS} FROM records WHERE workflow = ? AND releaseId = ? ORDER BY processedAt ASC`)
      .all(workflow, releaseId) as RecordRow[];
    return rows.map((row) => this.toRecord(row));
  }

  async resumeDate(workflow: string): Promise<Date | undefined> {
    const row = this.db
      .prepare(
        `
        SELECT
          MAX(CASE WHEN status = 'archived' THEN messageDate END) AS latestArchived,
          MIN(CASE WHEN status = 'failed' THEN messageDate END) AS oldestFailed,
          SUM(CASE WHEN status = 'failed' AND messageDate IS NULL THEN 1 ELSE 0 END) AS undatedFailures
        FROM records
        WHERE workflow = ?
      `,
      )
      .get(workflow) as ResumeRow | undefined;
    return resumeDateFrom(row?.latestArchived ?? undefined, row?.oldestFailed ?? undefined, row?.undatedFailures ?? 0);
  }

  async getFragmentGroup(workflow: string, releaseId: string): Promise<FragmentGroup | undefined> {
    const row = this.db
      .prepare(
        `
        SELECT workflow, releaseId, folderName, fragmentsJson, firstSeenAt, lastFragmentAt, complete
        FROM fragment_groups
        WHERE workflow = ? AND releaseId = ?
      `,
      )
      .get(workflow, releaseId) as FragmentGroupRow | undefined;
    return row ? this.toFragmentGroup(row) : undefined;
  }

  async saveFragmentGroup(group: FragmentGroup): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO fragment_groups (workflow, releaseId, folderName, fragmentsJson, firstSeenAt, lastFragmentAt, complete)
        VALUES (@workflow, @releaseId, @folderName, @fragmentsJson, @firstSeenAt, @lastFragmentAt, @complete)
        ON CONFLICT(workflow, releaseId) DO UPDATE SET
          folderName = excluded.folderName,
          fragmentsJson = excluded.fragmentsJson,
          lastFragmentAt = excluded.lastFragmentAt,
          complete = excluded.complete
      `,
      )
      .run({
        workflow: group.workflow,
        releaseId: group.releaseId,
        folderName: group.folderName,
        fragmentsJson: JSON.stringify(group.fragments),
        firstSeenAt: group.firstSeenAt,
        lastFragmentAt: group.lastFragmentAt,
        complete: group.complete ? 1 : 0,
      });
  }

  async listFragmentGroups(workflow: string): Promise<FragmentGroup[]> {
    const rows = this.db
      .prepare(
        `
        SELECT workflow, releaseId, folderName, fragmentsJson, firstSeenAt, lastFragmentAt, complete
        FROM fragment_groups
        WHERE workflow = ?
        ORDER BY firstSeenAt ASC
      `,
      )
      .all(workflow) as FragmentGroupRow[];
    return rows.map((row) => this.toFragmentGroup(row));
  }

  async deleteFragmentGroup(workflow: string, releaseId: string): Promise<void> {
    this.db.prepare("DELETE FROM fragment_groups WHERE workflow = ? AND releaseId = ?").run(workflow, releaseId);
  }

  async getStats(workflow: string): Promise<LedgerStats> {
    const rows = this.db
      .prepare("SELECT status, COUNT(*) AS count FROM records WHERE workflow = ? GROUP BY status")
      .all(workflow) as Array<{ status: ProcessingStatus; count: number }>;
    const counts = new Map(rows.map((row) => [row.status, row.count]));
    const groups = this.db
      .prepare("SELECT COUNT(*) AS count FROM fragment_groups WHERE workflow = ?")
      .get(workflow) as { count: number };
    const last = this.db
      .prepare("SELECT MAX(processedAt) AS lastProcessedAt FROM records WHERE workflow = ?")
      .get(workflow) as { lastProcessedAt: string | null };

    const pending = counts.get("pending") ?? 0;
    const archived = counts.get("archived") ?? 0;
    const skipped = counts.get("skipped") ?? 0;
    const failed = counts.get("failed") ?? 0;

    return {
      total: pending + archived + skipped + failed,
      pending,
      archived,
      skipped,
      failed,
      openFragmentGroups: groups.count,
      lastProcessedAt: last.lastProcessedAt ?? undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private findRow(workflow: string, messageId: string): RecordRow | undefined {
    const direct = this.db
      .prepare(`SELECT ${RECORD_COLUMNS} FROM records WHERE workflow = ? AND messageId = ?`)
      .get(workflow, messageId) as RecordRow | undefined;
    if (direct) {
      return direct;
    }

    return this.db
      .prepare(
        `
        SELECT r.workflow, r.messageId, r.status, r.uid, r.releaseId, r.destinationPath, r.subject, r.messageDate,
          r.processedAt, r.runId, r.attachmentsJson, r.unhandledJson, r.errorKind, r.errorMessage, r.errorDetailsJson
        FROM record_members m
        JOIN records r ON r.workflow = m.workflow AND r.messageId = m.messageId
        WHERE m.workflow = ? AND m.memberMessageId = ?
      `,
      )
      .get(workflow, messageId) as RecordRow | undefined;
  }

  private toRecord(row: RecordRow): ProcessingRecord {
    const members = this.db
      .prepare("SELECT memberMessageId FROM record_members WHERE workflow = ? AND messageId = ? ORDER BY rowid ASC")
      .all(row.workflow, row.messageId) as Array<{ memberMessageId: string }>;

    return {
      workflow: row.workflow,
      messageId: row.messageId,
      status: row.status,
      uid: row.uid ?? undefined,
      releaseId: row.releaseId ?? undefined,
      destinationPath: row.destinationPath ?? undefined,
      subject: row.subject ?? undefined,
      messageDate: row.messageDate ?? undefined,
      processedAt: row.processedAt,
      runId: row.runId ?? undefined,
      memberMessageIds: members.map((member) => member.memberMessageId),
      attachments: parseJson<AttachmentResult[]>(row.attachmentsJson, []),
      unhandled: parseJson<string[]>(row.unhandledJson, []),
      error: row.errorKind
        ? {
            kind: row.errorKind,
            message: row.errorMessage ?? "",
            details: parseJson<AttachmentFailure[] | undefined>(row.errorDetailsJson, undefined),
          }
        : undefined,
    };
  }

  private toFragmentGroup(row: FragmentGroupRow): FragmentGroup {
    return {
      workflow: row.workflow,
      releaseId: row.releaseId,
      folderName: row.folderName,
      fragments: parseJson<FragmentEntry[]>(row.fragmentsJson, []),
      firstSeenAt: row.firstSeenAt,
      lastFragmentAt: row.lastFragmentAt,
      complete: row.complete === 1,
    };
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        workflow TEXT NOT NULL,
        messageId TEXT NOT NULL,
        status TEXT NOT NULL,
        uid INTEGER NULL,
        releaseId TEXT NULL,
        destinationPath TEXT NULL,
        subject TEXT NULL,
        messageDate TEXT NULL,
        processedAt TEXT NOT NULL,
        runId TEXT NULL,
        attachmentsJson TEXT NOT NULL DEFAULT '[]',
        unhandledJson TEXT NOT NULL DEFAULT '[]',
        errorKind TEXT NULL,
        errorMessage TEXT NULL,
        errorDetailsJson TEXT NULL,
        PRIMARY KEY (workflow, messageId)
      );

      CREATE TABLE IF NOT EXISTS record_members (
        workflow TEXT NOT NULL,
        memberMessageId TEXT NOT NULL,
        messageId TEXT NOT NULL,
        PRIMARY KEY (workflow, memberMessageId)
      );

      CREATE TABLE IF NOT EXISTS fragment_groups (
        workflow TEXT NOT NULL,
        releaseId TEXT NOT NULL,
        folderName TEXT NOT NULL,
        fragmentsJson TEXT NOT NULL,
        firstSeenAt TEXT NOT NULL,
        lastFragmentAt TEXT NOT NULL,
        complete INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (workflow, releaseId)
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        workflow TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        summaryJson TEXT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_records_status ON records(workflow, status);
      CREATE INDEX IF NOT EXISTS idx_records_release ON records(workflow, releaseId);
      CREATE INDEX IF NOT EXISTS idx_record_members_record ON record_members(workflow, messageId);
    `);
  }
}
