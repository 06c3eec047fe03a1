import { AttachmentKind, AttachmentResult, RawAttachment } from "../../types";
import { AttachmentHandler, HandlerContext } from "../types";
import { saveAttachment, toResult } from "./common";

class StoreAsIsHandler implements AttachmentHandler {
  readonly name: string;
  readonly kind: AttachmentKind;

  constructor(name: string, kind: AttachmentKind) {
    this.name = name;
    this.kind = kind;
  }

  async handle(attachment: RawAttachment, targetDir: string, _options: unknown, context: HandlerContext): Promise<AttachmentResult[]> {
    const saved = await saveAttachment(attachment, targetDir);
    return [await toResult(saved, this.name, this.kind, context.releaseDir)];
  }
}

export function createSaveImageHandler(): AttachmentHandler {
  return new StoreAsIsHandler("save_image", "image");
}

export function createSaveFileHandler(): AttachmentHandler {
  return new StoreAsIsHandler("save_file", "file");
}
