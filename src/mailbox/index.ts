export { bodyText, htmlToText } from "./body";
export { deriveMessageId, normalizeMessageId } from "./identity";
export { ImapMailbox, toCandidate } from "./imapMailbox";
export { buildSearchCriteria } from "./query";
export type { SearchOverrides } from "./query";
export type { Mailbox, SearchCriteria } from "./types";
