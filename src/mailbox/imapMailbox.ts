import { ImapFlow, SearchObject } from "imapflow";
import { AddressObject, ParsedMail, simpleParser } from "mailparser";
import { ImapSettings } from "../config";
import { MailboxFailure } from "../core/errors";
import { Logger } from "../observability";
import { CandidateMessage, RawAttachment } from "../types";
import { deriveMessageId, normalizeMessageId } from "./identity";
import { Mailbox, SearchCriteria } from "./types";

interface ParsedCandidate {
  candidate: CandidateMessage;
  attachments: RawAttachment[];
}

function addressText(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) {
    return "";
  }
  return Array.isArray(value) ? value.map((entry) => entry.text).join(", ") : value.text;
}

function toRawAttachments(parsed: ParsedMail): RawAttachment[] {
  return parsed.attachments
    .filter((attachment) => attachment.contentDisposition !== "inline" || Boolean(attachment.filename))
    .map((attachment, index) => ({
      filename: attachment.filename ?? `attachment-${index + 1}`,
      contentType: attachment.contentType,
      content: attachment.content,
    }));
}

export function toCandidate(parsed: ParsedMail, uid?: number): ParsedCandidate {
  const attachments = toRawAttachments(parsed);
  const from = addressText(parsed.from);
  const subject = parsed.subject ?? "";
  const messageId =
    normalizeMessageId(parsed.messageId) ??
    deriveMessageId({ from, subject, date: parsed.date, attachmentNames: attachments.map((a) => a.filename) });

  return {
    candidate: {
      uid,
      messageId,
      subject,
      from,
      to: addressText(parsed.to) || undefined,
      date: parsed.date,
      textBody: parsed.text,
      htmlBody: typeof parsed.html === "string" ? parsed.html : undefined,
      attachments: attachments.map((attachment) => ({
        filename: attachment.filename,
        contentType: attachment.contentType,
        size: attachment.content.length,
      })),
    },
    attachments,
  };
}

function toSearchObject(criteria: SearchCriteria): SearchObject {
  if (criteria.uid !== undefined) {
    return { uid: String(criteria.uid) };
  }
  if (criteria.messageId) {
    return { header: { "message-id": criteria.messageId } };
  }

  const query: SearchObject = {};
  if (criteria.from) {
    query.from = criteria.from;
  }
  if (criteria.subject) {
    query.subject = criteria.subject;
  }
  if (criteria.since) {
    query.since = criteria.since;
  }
  if (criteria.before) {
    query.before = criteria.before;
  }
  if (Object.keys(query).length === 0) {
    query.all = true;
  }
  return query;
}

export class ImapMailbox implements Mailbox {
  private readonly settings: ImapSettings;
  private readonly logger: Logger;
  private client?: ImapFlow;
  private lastParsed?: ParsedCandidate;

  constructor(settings: ImapSettings, logger: Logger) {
    this.settings = settings;
    this.logger = logger;
  }

  async *search(criteria: SearchCriteria): AsyncIterable<CandidateMessage> {
    const client = await this.connect();
    let lock: { release(): void };
    try {
      lock = await client.getMailboxLock(criteria.folder);
    } catch (error) {
      throw new MailboxFailure(`Cannot open mailbox folder ${criteria.folder}`, error);
    }

    try {
      let uids: number[];
      try {
        const found = await client.search(toSearchObject(criteria), { uid: true });
        uids = Array.isArray(found) ? [...found].sort((a, b) => a - b) : [];
      } catch (error) {
        throw new MailboxFailure(`Search failed in ${criteria.folder}`, error);
      }
      this.logger.info("mailbox_search_complete", { folder: criteria.folder, matches: uids.length });

      for (const uid of uids) {
        const parsed = await this.fetchParsed(client, uid);
        if (!parsed) {
          this.logger.warn("mailbox_message_vanished", { uid });
          continue;
        }
        this.lastParsed = parsed;
        yield parsed.candidate;
      }
    } finally {
      lock.release();
    }
  }

  async fetchAttachments(candidate: CandidateMessage, folder: string): Promise<RawAttachment[]> {
    if (this.lastParsed && this.lastParsed.candidate.messageId === candidate.messageId) {
      return this.lastParsed.attachments;
    }

    const client = await this.connect();
    const lock = await client.getMailboxLock(folder);
    try {
      let uid = candidate.uid;
      if (uid === undefined || !(await this.sameMessage(client, uid, candidate.messageId))) {
        const found = await client.search({ header: { "message-id": candidate.messageId } }, { uid: true });
        uid = Array.isArray(found) && found.length > 0 ? found[0] : undefined;
      }
      if (uid === undefined) {
        throw new MailboxFailure(`Message ${candidate.messageId} is no longer in ${folder}`);
      }
      const parsed = await this.fetchParsed(client, uid);
      if (!parsed) {
        throw new MailboxFailure(`Message ${candidate.messageId} could not be fetched from ${folder}`);
      }
      return parsed.attachments;
    } catch (error) {
      if (error instanceof MailboxFailure) {
        throw error;
      }
      throw new MailboxFailure(`Fetching attachments for ${candidate.messageId} failed`, error);
    } finally {
      lock.release();
    }
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }
    const client = this.client;
    this.client = undefined;
    await client.logout().catch((error: unknown) => {
      this.logger.warn("mailbox_logout_failed", { error: error instanceof Error ? error.message : String(error) });
    });
  }

  private async connect(): Promise<ImapFlow> {
    if (this.client) {
      return this.client;
    }
    if (!this.settings.user || !this.settings.password) {
      throw new MailboxFailure("IMAP credentials are not configured (IMAP_USER / IMAP_PASSWORD)");
    }

    const client = new ImapFlow({
      host: this.settings.host,
      port: this.settings.port,
      secure: this.settings.secure,
      auth: {
        user: this.settings.user,
        pass: this.settings.password,
      },
      logger: false,
    });

    try {
      await client.connect();
    } catch (error) {
      throw new MailboxFailure(`Cannot connect to ${this.settings.host}:${this.settings.port}`, error);
    }
    this.logger.info("mailbox_connected", { host: this.settings.host });
    this.client = client;
    return client;
  }

  private async sameMessage(client: ImapFlow, uid: number, messageId: string): Promise<boolean> {
    const parsed = await this.fetchParsed(client, uid);
    if (parsed && parsed.candidate.messageId === messageId) {
      this.lastParsed = parsed;
      return true;
    }
    return false;
  }

  private async fetchParsed(client: ImapFlow, uid: number): Promise<ParsedCandidate | undefined> {
    if (this.lastParsed?.candidate.uid === uid) {
      return this.lastParsed;
    }
    let message;
    try {
      message = await client.fetchOne(String(uid), { uid: true, source: true }, { uid: true });
    } catch (error) {
      throw new MailboxFailure(`Fetching UID ${uid} failed`, error);
    }
    if (!message || !message.source) {
      return undefined;
    }
    const parsed = await simpleParser(message.source);
    return toCandidate(parsed, uid);
  }
}
