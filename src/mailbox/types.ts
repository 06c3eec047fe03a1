import { CandidateMessage, RawAttachment } from "../types";

export interface SearchCriteria {
  folder: string;
  from?: string;
  subject?: string;
  since?: Date;
  before?: Date;
  hasAttachments?: boolean;
  uid?: number;
  messageId?: string;
}

export interface Mailbox {
  search(criteria: SearchCriteria): AsyncIterable<CandidateMessage>;
  fetchAttachments(candidate: CandidateMessage, folder: string): Promise<RawAttachment[]>;
  close(): Promise<void>;
}
