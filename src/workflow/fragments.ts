import { Mailbox } from "../mailbox/types";
import { LedgerStore } from "../store";
import { CandidateMessage, FragmentEntry, FragmentGroup, RawAttachment, WorkflowSpec } from "../types";
import { ReleaseTarget } from "./classifier";

export interface MergedFragments {
  candidates: CandidateMessage[];
  attachments: RawAttachment[];
}

function dateValue(entry: FragmentEntry): number {
  const value = entry.date ? Date.parse(entry.date) : Number.NaN;
  return Number.isNaN(value) ? Number.POSITIVE_INFINITY : value;
}

function orderFragments(fragments: FragmentEntry[]): FragmentEntry[] {
  return fragments
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => dateValue(a.entry) - dateValue(b.entry) || a.index - b.index)
    .map(({ entry }) => entry);
}

function latestFragmentAt(fragments: FragmentEntry[], fallback: string): string {
  let latest: number | undefined;
  for (const fragment of fragments) {
    const value = dateValue(fragment);
    if (Number.isFinite(value) && (latest === undefined || value > latest)) {
      latest = value;
    }
  }
  return latest === undefined ? fallback : new Date(latest).toISOString();
}

export function fragmentToCandidate(entry: FragmentEntry): CandidateMessage {
  return {
    uid: entry.uid,
    messageId: entry.messageId,
    subject: entry.subject,
    from: entry.from,
    date: entry.date ? new Date(entry.date) : undefined,
    attachments: [],
  };
}

export class FragmentMerger {
  private readonly store: LedgerStore;
  private readonly workflow: WorkflowSpec;

  constructor(store: LedgerStore, workflow: WorkflowSpec) {
    this.store = store;
    this.workflow = workflow;
  }

  async ingest(candidate: CandidateMessage, release: ReleaseTarget, now: Date = new Date()): Promise<FragmentGroup> {
    const seenAt = now.toISOString();
    const existing = await this.store.getFragmentGroup(this.workflow.name, release.releaseId);
    const fragments = existing ? existing.fragments.filter((entry) => entry.messageId !== candidate.messageId) : [];

    fragments.push({
      messageId: candidate.messageId,
      uid: candidate.uid,
      subject: candidate.subject,
      from: candidate.from,
      date: candidate.date?.toISOString(),
    });

    const ordered = orderFragments(fragments);
    const group: FragmentGroup = {
      workflow: this.workflow.name,
      releaseId: release.releaseId,
      folderName: existing?.folderName ?? release.folderName,
      fragments: ordered,
      firstSeenAt: existing?.firstSeenAt ?? seenAt,
      lastFragmentAt: latestFragmentAt(ordered, seenAt),
      complete: false,
    };
    group.complete = this.isComplete(group, now);

    await this.store.saveFragmentGroup(group);
    return group;
  }

  isComplete(group: FragmentGroup, now: Date = new Date()): boolean {
    const policy = this.workflow.merge.policy;
    if (policy.kind === "expected_count") {
      return group.fragments.length >= policy.expectedCount;
    }
    const quietMs = policy.quietPeriodMinutes * 60_000;
    return now.getTime() - Date.parse(group.lastFragmentAt) >= quietMs;
  }

  async openGroups(): Promise<FragmentGroup[]> {
    return this.store.listFragmentGroups(this.workflow.name);
  }

  async dueGroups(now: Date = new Date()): Promise<FragmentGroup[]> {
    const groups = await this.openGroups();
    return groups.filter((group) => this.isComplete(group, now));
  }

  async collect(group: FragmentGroup, mailbox: Mailbox): Promise<MergedFragments> {
    const candidates = orderFragments(group.fragments).map(fragmentToCandidate);
    const attachments: RawAttachment[] = [];
    for (const candidate of candidates) {
      attachments.push(...(await mailbox.fetchAttachments(candidate, this.workflow.mailboxFolder)));
    }
    return { candidates, attachments };
  }

  async discard(group: FragmentGroup): Promise<void> {
    await this.store.deleteFragmentGroup(group.workflow, group.releaseId);
  }
}
