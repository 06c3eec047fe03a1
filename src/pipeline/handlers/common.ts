import fs from "node:fs";
import path from "node:path";
import { AttachmentKind, AttachmentResult, HandlerOptions, RawAttachment } from "../../types";
import { cleanText, slugifyFilename } from "../slug";

export interface SavedFile {
  original: string;
  slugified: string;
  filePath: string;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

function numberedName(filename: string, n: number): string {
  if (n < 2) {
    return filename;
  }
  const ext = path.extname(filename);
  return `${filename.slice(0, filename.length - ext.length)}_${n}${ext}`;
}

// Never overwrites: a name already taken in targetDir gets _2, _3, ... before the extension.
export async function saveAttachment(attachment: RawAttachment, targetDir: string): Promise<SavedFile> {
  const original = cleanText(attachment.filename);
  const base = slugifyFilename(original);
  await fs.promises.mkdir(targetDir, { recursive: true });

  for (let n = 1; ; n += 1) {
    const slugified = numberedName(base, n);
    const filePath = path.join(targetDir, slugified);
    try {
      await fs.promises.writeFile(filePath, attachment.content, { flag: "wx" });
      return { original, slugified, filePath };
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
}

export function relativeToRelease(releaseDir: string, filePath: string): string {
  return path.relative(releaseDir, filePath).split(path.sep).join("/");
}

export async function toResult(
  saved: SavedFile,
  handler: string,
  kind: AttachmentKind,
  releaseDir: string,
  metadata?: Record<string, unknown>,
): Promise<AttachmentResult> {
  const stat = await fs.promises.stat(saved.filePath);
  return {
    original: saved.original,
    slugified: path.basename(saved.filePath),
    bytes: stat.size,
    handler,
    path: relativeToRelease(releaseDir, saved.filePath),
    kind,
    ...(metadata ? { metadata } : {}),
  };
}

export function stringOption(options: HandlerOptions, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function numberOption(options: HandlerOptions, key: string): number | undefined {
  const value = options[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
