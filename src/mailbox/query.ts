import { WorkflowSpec } from "../types";
import { SearchCriteria } from "./types";

export interface SearchOverrides {
  uid?: number;
  messageId?: string;
  resumeFrom?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function parseBound(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function buildSearchCriteria(workflow: WorkflowSpec, overrides: SearchOverrides = {}): SearchCriteria {
  const folder = workflow.mailboxFolder;

  if (overrides.uid !== undefined) {
    return { folder, uid: overrides.uid };
  }
  if (overrides.messageId) {
    return { folder, messageId: overrides.messageId };
  }

  const configuredAfter = parseBound(workflow.filters.afterDate);
  const before = parseBound(workflow.filters.beforeDate);
  return {
    folder,
    from: workflow.filters.sender,
    subject: workflow.filters.subjectContains,
    since: configuredAfter ?? overrides.resumeFrom,
    // IMAP BEFORE is exclusive; the configured bound is inclusive.
    before: before ? new Date(before.getTime() + DAY_MS) : undefined,
    hasAttachments: workflow.filters.requireAttachments || undefined,
  };
}
