import { FragmentGroup, ProcessingRecord, ProcessingStatus, RunSummary } from "../types";

export interface LedgerStats {
  total: number;
  pending: number;
  archived: number;
  skipped: number;
  failed: number;
  openFragmentGroups: number;
  lastProcessedAt?: string;
}

export function resumeDateFrom(latestArchived?: string, oldestFailed?: string, undatedFailures = 0): Date | undefined {
  if (!latestArchived || undatedFailures > 0) {
    return undefined;
  }
  return new Date(oldestFailed && oldestFailed < latestArchived ? oldestFailed : latestArchived);
}

export type ClearTarget = { messageId: string } | { releaseId: string };

export interface LedgerStore {
  startRun(runId: string, workflow: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: "completed" | "failed", finishedAt: string, summary?: RunSummary): Promise<void>;
  hasProcessed(workflow: string, messageId: string): Promise<ProcessingStatus | undefined>;
  getRecord(workflow: string, messageId: string): Promise<ProcessingRecord | undefined>;
  record(record: ProcessingRecord): Promise<void>;
  forceClear(workflow: string, target: ClearTarget): Promise<number>;
  listRecords(workflow: string): Promise<ProcessingRecord[]>;
  findByRelease(workflow: string, releaseId: string): Promise<ProcessingRecord[]>;
  /**
   * Date a default run can search from: the newest archived message, moved back to the
   * oldest failed one so retries are fetched again. Undefined means search everything.
   */
  resumeDate(workflow: string): Promise<Date | undefined>;
  getFragmentGroup(workflow: string, releaseId: string): Promise<FragmentGroup | undefined>;
  saveFragmentGroup(group: FragmentGroup): Promise<void>;
  listFragmentGroups(workflow: string): Promise<FragmentGroup[]>;
  deleteFragmentGroup(workflow: string, releaseId: string): Promise<void>;
  getStats(workflow: string): Promise<LedgerStats>;
  close(): Promise<void>;
}
