import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import AdmZip from "adm-zip";
import { buildWorkflowSpec } from "../../src/config";
import { Mailbox, SearchCriteria } from "../../src/mailbox/types";
import { Logger } from "../../src/observability";
import { AudioNormalizer, NormalizeRequest, NormalizeResult, createDefaultRegistry, outputPathFor } from "../../src/pipeline";
import { CandidateMessage, RawAttachment, WorkflowSpec } from "../../src/types";

export const HANDLER_NAMES = createDefaultRegistry().names();

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test" }, "error");
}

export const SONIC_TWIST_PROCESSORS = [
  { name: "zip_extractor", patterns: ["*.zip"], handler: "process_zip_attachment" },
  { name: "audio", patterns: ["*.mp3", "*.m4a"], handler: "normalize_audio" },
  { name: "lyrics", patterns: ["*.docx"], handler: "extract_docx_text" },
  { name: "images", patterns: ["*.jpg", "*.png"], handler: "save_image" },
];

export function makeWorkflow(archiveRoot: string, raw: Record<string, unknown> = {}): WorkflowSpec {
  return buildWorkflowSpec(
    {
      name: "sonic_twist",
      description: "test workflow",
      release: { label: "Episode", folderTemplate: "Episode_{number}" },
      processors: SONIC_TWIST_PROCESSORS,
      ...raw,
    },
    archiveRoot,
    HANDLER_NAMES,
  );
}

export function makeCandidate(overrides: Partial<CandidateMessage> = {}): CandidateMessage {
  return {
    uid: 1,
    messageId: "msg-1@example.test",
    subject: "Newsletter — Episode 42",
    from: "Sonic Twist <newsletter@sonictwist.example>",
    date: new Date("2024-03-10T12:00:00.000Z"),
    textBody: "This week: a new track.",
    attachments: [],
    ...overrides,
  };
}

export function makeZip(entries: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content, "utf-8"));
  }
  return zip.toBuffer();
}

export function attachment(filename: string, content: string | Buffer): RawAttachment {
  return { filename, content: typeof content === "string" ? Buffer.from(content, "utf-8") : content };
}

export interface StoredMessage {
  candidate: CandidateMessage;
  attachments: RawAttachment[];
}

export function stored(candidate: CandidateMessage, attachments: RawAttachment[]): StoredMessage {
  return {
    candidate: {
      ...candidate,
      attachments: attachments.map((item) => ({ filename: item.filename, size: item.content.length })),
    },
    attachments,
  };
}

export class FakeMailbox implements Mailbox {
  readonly messages: StoredMessage[];
  readonly searches: SearchCriteria[] = [];
  readonly fetched: string[] = [];
  closed = false;
  searchError?: Error;

  constructor(messages: StoredMessage[] = []) {
    this.messages = messages;
  }

  async *search(criteria: SearchCriteria): AsyncIterable<CandidateMessage> {
    this.searches.push(criteria);
    if (this.searchError) {
      throw this.searchError;
    }
    for (const message of this.messages) {
      if (criteria.uid !== undefined && message.candidate.uid !== criteria.uid) {
        continue;
      }
      if (criteria.messageId !== undefined && message.candidate.messageId !== criteria.messageId) {
        continue;
      }
      if (criteria.since && message.candidate.date && message.candidate.date < criteria.since) {
        continue;
      }
      yield message.candidate;
    }
  }

  async fetchAttachments(candidate: CandidateMessage): Promise<RawAttachment[]> {
    this.fetched.push(candidate.messageId);
    const message = this.messages.find((entry) => entry.candidate.messageId === candidate.messageId);
    return message ? message.attachments.map((item) => ({ ...item, content: Buffer.from(item.content) })) : [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeNormalizer implements AudioNormalizer {
  readonly calls: Array<{ inputPath: string; request: NormalizeRequest }> = [];
  failFor?: string;

  async normalize(inputPath: string, request: NormalizeRequest): Promise<NormalizeResult> {
    this.calls.push({ inputPath, request });
    if (this.failFor && path.basename(inputPath) === this.failFor) {
      throw new Error("loudnorm exploded");
    }
    const outputPath = outputPathFor(inputPath, request.outputFormat);
    if (outputPath !== inputPath) {
      fs.renameSync(inputPath, outputPath);
    }
    return { outputPath, inputLoudness: -20.5 };
  }
}

// Stands in for mammoth / pdf-parse: the "document" is its own UTF-8 text.
export const plainTextExtractor = async (content: Buffer): Promise<string> => content.toString("utf-8").trim();
