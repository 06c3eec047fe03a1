import { FragmentGroup, ProcessingRecord, ProcessingStatus, RunSummary } from "../types";
import { ClearTarget, LedgerStats, LedgerStore, resumeDateFrom } from "./types";

interface RunEntry {
  workflow: string;
  startedAt: string;
  finishedAt?: string;
  status: "running" | "completed" | "failed";
  summary?: RunSummary;
}

function keyOf(workflow: string, id: string): string {
  return `${workflow}\u0000${id}`;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly records = new Map<string, ProcessingRecord>();
  private readonly members = new Map<string, string>();
  private readonly groups = new Map<string, FragmentGroup>();
  readonly runs = new Map<string, RunEntry>();

  async startRun(runId: string, workflow: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { workflow, startedAt, status: "running" });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string, summary?: RunSummary): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt, summary });
    }
  }

  async hasProcessed(workflow: string, messageId: string): Promise<ProcessingStatus | undefined> {
    return this.find(workflow, messageId)?.status;
  }

  async getRecord(workflow: string, messageId: string): Promise<ProcessingRecord | undefined> {
    const record = this.find(workflow, messageId);
    return record ? clone(record) : undefined;
  }

  async record(record: ProcessingRecord): Promise<void> {
    for (const [memberKey, owner] of this.members) {
      if (owner === record.messageId && memberKey.startsWith(`${record.workflow}\u0000`)) {
        this.members.delete(memberKey);
      }
    }
    for (const member of record.memberMessageIds) {
      if (member !== record.messageId) {
        this.records.delete(keyOf(record.workflow, member));
      }
      this.members.set(keyOf(record.workflow, member), record.messageId);
    }
    this.records.set(keyOf(record.workflow, record.messageId), clone(record));
  }

  async forceClear(workflow: string, target: ClearTarget): Promise<number> {
    const doomed =
      "messageId" in target
        ? [this.find(workflow, target.messageId)].filter((record): record is ProcessingRecord => record !== undefined)
        : [...this.records.values()].filter((record) => record.workflow === workflow && record.releaseId === target.releaseId);

    for (const record of doomed) {
      this.records.delete(keyOf(workflow, record.messageId));
      for (const [memberKey, owner] of this.members) {
        if (owner === record.messageId && memberKey.startsWith(`${workflow}\u0000`)) {
          this.members.delete(memberKey);
        }
      }
    }
    if ("releaseId" in target) {
      this.groups.delete(keyOf(workflow, target.releaseId));
    }
    return doomed.length;
  }

  async listRecords(workflow: string): Promise<ProcessingRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.workflow === workflow)
      .sort((a, b) => a.processedAt.localeCompare(b.processedAt) || a.messageId.localeCompare(b.messageId))
      .map(clone);
  }

  async findByRelease(workflow: string, releaseId: string): Promise<ProcessingRecord[]> {
    return (await this.listRecords(workflow)).filter((record) => record.releaseId === releaseId);
  }

  async resumeDate(workflow: string): Promise<Date | undefined> {
    let latestArchived: string | undefined;
    let oldestFailed: string | undefined;
    let undatedFailures = 0;
    for (const record of this.records.values()) {
      if (record.workflow !== workflow) {
        continue;
      }
      if (record.status === "archived" && record.messageDate && (!latestArchived || record.messageDate > latestArchived)) {
        latestArchived = record.messageDate;
      }
      if (record.status === "failed") {
        if (!record.messageDate) {
          undatedFailures += 1;
        } else if (!oldestFailed || record.messageDate < oldestFailed) {
          oldestFailed = record.messageDate;
        }
      }
    }
    return resumeDateFrom(latestArchived, oldestFailed, undatedFailures);
  }

  async getFragmentGroup(workflow: string, releaseId: string): Promise<FragmentGroup | undefined> {
    const group = this.groups.get(keyOf(workflow, releaseId));
    return group ? clone(group) : undefined;
  }

  async saveFragmentGroup(group: FragmentGroup): Promise<void> {
    this.groups.set(keyOf(group.workflow, group.releaseId), clone(group));
  }

  async listFragmentGroups(workflow: string): Promise<FragmentGroup[]> {
    return [...this.groups.values()]
      .filter((group) => group.workflow === workflow)
      .sort((a, b) => a.firstSeenAt.localeCompare(b.firstSeenAt))
      .map(clone);
  }

  async deleteFragmentGroup(workflow: string, releaseId: string): Promise<void> {
    this.groups.delete(keyOf(workflow, releaseId));
  }

  async getStats(workflow: string): Promise<LedgerStats> {
    const records = await this.listRecords(workflow);
    const count = (status: ProcessingStatus) => records.filter((record) => record.status === status).length;
    const lastProcessedAt = records.reduce<string | undefined>(
      (latest, record) => (!latest || record.processedAt > latest ? record.processedAt : latest),
      undefined,
    );

    return {
      total: records.length,
      pending: count("pending"),
      archived: count("archived"),
      skipped: count("skipped"),
      failed: count("failed"),
      openFragmentGroups: (await this.listFragmentGroups(workflow)).length,
      lastProcessedAt,
    };
  }

  async close(): Promise<void> {
    return;
  }

  private find(workflow: string, messageId: string): ProcessingRecord | undefined {
    const direct = this.records.get(keyOf(workflow, messageId));
    if (direct) {
      return direct;
    }
    const owner = this.members.get(keyOf(workflow, messageId));
    return owner ? this.records.get(keyOf(workflow, owner)) : undefined;
  }
}
