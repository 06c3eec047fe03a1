import path from "node:path";
import AdmZip from "adm-zip";
import { AttachmentResult, HandlerOptions, RawAttachment } from "../../types";
import { AttachmentHandler, HandlerContext } from "../types";
import { stringOption } from "./common";

export const ZIP_HANDLER_NAME = "process_zip_attachment";

function isJunkEntry(entryName: string): boolean {
  const base = path.posix.basename(entryName);
  return (
    base.length === 0 ||
    base.startsWith(".") ||
    base.startsWith("__") ||
    entryName.split("/").some((segment) => segment === "__MACOSX")
  );
}

export class ZipArchiveHandler implements AttachmentHandler {
  readonly name = ZIP_HANDLER_NAME;
  readonly kind = "file" as const;

  async handle(attachment: RawAttachment, targetDir: string, options: HandlerOptions, context: HandlerContext): Promise<AttachmentResult[]> {
    const extractTo = stringOption(options, "extract_to");
    const extractDir = extractTo ? path.join(targetDir, extractTo) : targetDir;
    const archive = new AdmZip(attachment.content);
    const entries = archive.getEntries().filter((entry) => !entry.isDirectory && !isJunkEntry(entry.entryName));

    context.logger.info("zip_unpacking", { filename: attachment.filename, entries: entries.length });

    const results: AttachmentResult[] = [];
    for (const entry of entries) {
      const inner: RawAttachment = {
        filename: path.posix.basename(entry.entryName),
        content: entry.getData(),
      };
      const innerResults = await context.dispatch(inner, {
        targetDir: extractDir,
        excludeHandlers: new Set([ZIP_HANDLER_NAME]),
      });
      results.push(...innerResults);
    }

    return results;
  }
}
