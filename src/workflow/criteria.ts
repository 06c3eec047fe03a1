import { CandidateMessage, WorkflowSpec } from "../types";

export type MismatchReason = "sender" | "subject" | "after" | "before" | "attachments" | "excluded";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ANGLE_ADDRESS = /<([^>]+)>/;

function senderMatches(from: string, expected: string): boolean {
  const wanted = expected.trim().toLowerCase();
  const actual = from.trim().toLowerCase();
  if (actual === wanted) {
    return true;
  }
  const address = ANGLE_ADDRESS.exec(actual)?.[1]?.trim();
  return address === wanted;
}

function lowerBound(value: string): number {
  return new Date(DATE_ONLY.test(value) ? `${value}T00:00:00.000Z` : value).getTime();
}

function upperBound(value: string): number {
  return new Date(DATE_ONLY.test(value) ? `${value}T23:59:59.999Z` : value).getTime();
}

// First rule the candidate fails, in evaluation order. Used for debug logging.
export function describeMismatch(candidate: CandidateMessage, workflow: WorkflowSpec): MismatchReason | undefined {
  const filters = workflow.filters;

  if (filters.sender && !senderMatches(candidate.from, filters.sender)) {
    return "sender";
  }
  if (filters.subjectContains && !candidate.subject.toLowerCase().includes(filters.subjectContains.toLowerCase())) {
    return "subject";
  }

  const sentAt = candidate.date?.getTime();
  if (sentAt !== undefined && !Number.isNaN(sentAt)) {
    if (filters.afterDate && sentAt < lowerBound(filters.afterDate)) {
      return "after";
    }
    if (filters.beforeDate && sentAt > upperBound(filters.beforeDate)) {
      return "before";
    }
  }

  if (filters.requireAttachments && candidate.attachments.length === 0) {
    return "attachments";
  }

  const subject = candidate.subject.toLowerCase();
  const from = candidate.from.toLowerCase();
  const excluded = filters.excludePatterns.some((pattern) => {
    const needle = pattern.toLowerCase();
    return needle.length > 0 && (subject.includes(needle) || from.includes(needle));
  });
  return excluded ? "excluded" : undefined;
}

export function matchesCriteria(candidate: CandidateMessage, workflow: WorkflowSpec): boolean {
  return describeMismatch(candidate, workflow) === undefined;
}
