import fs from "node:fs";
import { simpleParser } from "mailparser";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MailboxFailure } from "../../../src/core/errors";
import {
  ImapMailbox,
  bodyText,
  buildSearchCriteria,
  deriveMessageId,
  htmlToText,
  normalizeMessageId,
  toCandidate,
} from "../../../src/mailbox";
import { makeTempDir, makeWorkflow, quietLogger } from "../../helpers/fixtures";

const RAW_MESSAGE = [
  "From: Sonic Twist <newsletter@sonictwist.example>",
  "To: archivist@example.test",
  "Subject: Episode 42",
  "Message-ID: <ep42@sonictwist.example>",
  "Date: Sun, 10 Mar 2024 12:00:00 +0000",
  "MIME-Version: 1.0",
  'Content-Type: multipart/mixed; boundary="XYZ"',
  "",
  "--XYZ",
  "Content-Type: text/plain; charset=utf-8",
  "",
  "Hello listeners.",
  "--XYZ",
  'Content-Type: text/plain; name="notes.txt"',
  'Content-Disposition: attachment; filename="notes.txt"',
  "Content-Transfer-Encoding: base64",
  "",
  "aGVsbG8=",
  "--XYZ--",
  "",
].join("\r\n");

describe("htmlToText", () => {
  it("keeps block structure and drops scripts", () => {
    const html = "<html><head><title>t</title></head><body><p>Hello <b>there</b></p><p>Line<br>two</p><script>bad()</script></body></html>";
    expect(htmlToText(html)).toBe("Hello there\nLine\ntwo");
  });
});

describe("bodyText", () => {
  it("prefers the plain text body", () => {
    expect(bodyText({ textBody: "plain", htmlBody: "<p>html</p>" })).toBe("plain");
  });

  it("falls back to the html body when the text body is blank", () => {
    expect(bodyText({ textBody: "  ", htmlBody: "<p>html</p>" })).toBe("html");
    expect(bodyText({})).toBe("");
  });
});

describe("message identity", () => {
  it("strips angle brackets from Message-ID headers", () => {
    expect(normalizeMessageId("  <abc@example.test>  ")).toBe("abc@example.test");
    expect(normalizeMessageId("<>")).toBeUndefined();
    expect(normalizeMessageId(undefined)).toBeUndefined();
  });

  it("derives a stable id from the message's fields", () => {
    const parts = { from: "A@Example.test", subject: "Episode 1", date: new Date("2024-01-01T00:00:00.000Z"), attachmentNames: ["a.mp3"] };

    const id = deriveMessageId(parts);

    expect(id).toMatch(/^sha256:[0-9a-f]{32}$/);
    expect(deriveMessageId({ ...parts, from: "a@example.test" })).toBe(id);
    expect(deriveMessageId({ ...parts, subject: "Episode 2" })).not.toBe(id);
  });
});

describe("toCandidate", () => {
  it("maps a parsed message and its attachments", async () => {
    const parsed = await simpleParser(RAW_MESSAGE);

    const { candidate, attachments } = toCandidate(parsed, 17);

    expect(candidate.uid).toBe(17);
    expect(candidate.messageId).toBe("ep42@sonictwist.example");
    expect(candidate.subject).toBe("Episode 42");
    expect(candidate.from).toContain("newsletter@sonictwist.example");
    expect(candidate.to).toContain("archivist@example.test");
    expect(candidate.date).toEqual(new Date("2024-03-10T12:00:00.000Z"));
    expect(candidate.textBody?.trim()).toBe("Hello listeners.");
    expect(candidate.attachments).toEqual([{ filename: "notes.txt", contentType: "text/plain", size: 5 }]);
    expect(attachments.map((item) => item.content.toString("utf-8"))).toEqual(["hello"]);
  });

  it("derives an id when the Message-ID header is missing", async () => {
    const parsed = await simpleParser(RAW_MESSAGE.replace("Message-ID: <ep42@sonictwist.example>\r\n", ""));

    const { candidate } = toCandidate(parsed);

    expect(candidate.messageId).toMatch(/^sha256:[0-9a-f]{32}$/);
    expect(candidate.uid).toBeUndefined();
  });
});

describe("buildSearchCriteria", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("criteria-");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("pushes filters to the server with an inclusive end date", () => {
    const workflow = makeWorkflow(root, {
      folder: "INBOX",
      filters: {
        sender: "newsletter@sonictwist.example",
        subjectContains: "Episode",
        afterDate: "2024-01-01",
        beforeDate: "2024-01-31",
        requireAttachments: true,
      },
    });

    expect(buildSearchCriteria(workflow, { resumeFrom: new Date("2024-06-01T00:00:00.000Z") })).toEqual({
      folder: "INBOX",
      from: "newsletter@sonictwist.example",
      subject: "Episode",
      since: new Date("2024-01-01T00:00:00.000Z"),
      before: new Date("2024-02-01T00:00:00.000Z"),
      hasAttachments: true,
    });
  });

  it("resumes from the last archived date when no start date is configured", () => {
    const workflow = makeWorkflow(root);
    const criteria = buildSearchCriteria(workflow, { resumeFrom: new Date("2024-06-01T00:00:00.000Z") });
    expect(criteria.since).toEqual(new Date("2024-06-01T00:00:00.000Z"));
    expect(criteria.hasAttachments).toBeUndefined();
  });

  it("targets a single message by uid or Message-ID", () => {
    const workflow = makeWorkflow(root, { folder: "INBOX" });
    expect(buildSearchCriteria(workflow, { uid: 9 })).toEqual({ folder: "INBOX", uid: 9 });
    expect(buildSearchCriteria(workflow, { messageId: "x@example.test" })).toEqual({ folder: "INBOX", messageId: "x@example.test" });
  });
});

describe("ImapMailbox", () => {
  it("refuses to connect without credentials", async () => {
    const mailbox = new ImapMailbox(
      { host: "imap.example.test", port: 993, secure: true, user: "", defaultFolder: "INBOX" },
      quietLogger("mailbox"),
    );

    const iterator = mailbox.search({ folder: "INBOX" })[Symbol.asyncIterator]();

    await expect(iterator.next()).rejects.toThrow(MailboxFailure);
    await expect(mailbox.close()).resolves.toBeUndefined();
  });
});
