import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { errorMessage } from "../../core/errors";
import { AttachmentResult, HandlerOptions, RawAttachment } from "../../types";
import { AttachmentHandler, HandlerContext } from "../types";
import { saveAttachment, stringOption, toResult } from "./common";

export type TextExtractor = (content: Buffer) => Promise<string>;

interface PdfParserLike {
  getText(): Promise<{ text: string }>;
  destroy(): Promise<void>;
}

export const extractDocxText: TextExtractor = async (content) => {
  const result = await mammoth.extractRawText({ buffer: content });
  return result.value.trim();
};

export function createPdfTextExtractor(parserFactory?: (data: Buffer) => PdfParserLike): TextExtractor {
  const factory = parserFactory ?? ((data: Buffer) => new PDFParse({ data }));
  return async (content) => {
    const parser = factory(content);
    try {
      const result = await parser.getText();
      return result.text.trim();
    } finally {
      await parser.destroy().catch(() => undefined);
    }
  };
}

class TextExtractingHandler implements AttachmentHandler {
  readonly kind = "document" as const;
  readonly name: string;
  private readonly extract: TextExtractor;

  constructor(name: string, extract: TextExtractor) {
    this.name = name;
    this.extract = extract;
  }

  async handle(attachment: RawAttachment, targetDir: string, options: HandlerOptions, context: HandlerContext): Promise<AttachmentResult[]> {
    const saved = await saveAttachment(attachment, targetDir);
    if (!context.workflow.lyrics.extractFromDocx) {
      return [await toResult(saved, this.name, this.kind, context.releaseDir)];
    }

    const fieldName = stringOption(options, "field_name") ?? context.workflow.lyrics.fieldName;
    let metadata: Record<string, unknown>;
    try {
      const text = await this.extract(attachment.content);
      context.extractedText[fieldName] = text;
      metadata = { field: fieldName, characters: text.length };
      context.logger.info("text_extracted", { filename: saved.original, field: fieldName, characters: text.length });
    } catch (error) {
      // Non-fatal: the document stays archived and the miss lands in metadata.
      metadata = { field: fieldName, extractionError: errorMessage(error) };
      context.logger.warn("text_extraction_failed", { filename: saved.original, error: errorMessage(error) });
    }

    return [await toResult(saved, this.name, this.kind, context.releaseDir, metadata)];
  }
}

export function createDocxTextHandler(extract: TextExtractor = extractDocxText): AttachmentHandler {
  return new TextExtractingHandler("extract_docx_text", extract);
}

export function createPdfTextHandler(extract: TextExtractor = createPdfTextExtractor()): AttachmentHandler {
  return new TextExtractingHandler("extract_pdf_text", extract);
}
