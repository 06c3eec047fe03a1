import {
  AudioNormalizer,
  createDocxTextHandler,
  createPdfTextHandler,
  createSaveFileHandler,
  createSaveImageHandler,
  FfmpegLoudnormNormalizer,
  NormalizeAudioHandler,
  TextExtractor,
  ZipArchiveHandler,
} from "./handlers";
import { AttachmentHandler } from "./types";

export class HandlerRegistry {
  private readonly handlers = new Map<string, AttachmentHandler>();

  constructor(handlers: AttachmentHandler[]) {
    for (const handler of handlers) {
      if (this.handlers.has(handler.name)) {
        throw new Error(`Duplicate attachment handler: ${handler.name}`);
      }
      this.handlers.set(handler.name, handler);
    }
  }

  get(name: string): AttachmentHandler {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw new Error(`Unknown handler: ${name}. Available: ${this.list().join(", ")}`);
    }
    return handler;
  }

  list(): string[] {
    return [...this.handlers.keys()].sort();
  }

  names(): ReadonlySet<string> {
    return new Set(this.handlers.keys());
  }
}

export interface RegistryDeps {
  ffmpegPath?: string;
  normalizer?: AudioNormalizer;
  docxExtractor?: TextExtractor;
  pdfExtractor?: TextExtractor;
}

export function createDefaultRegistry(deps: RegistryDeps = {}): HandlerRegistry {
  return new HandlerRegistry([
    new ZipArchiveHandler(),
    new NormalizeAudioHandler(deps.normalizer ?? new FfmpegLoudnormNormalizer(deps.ffmpegPath)),
    createDocxTextHandler(deps.docxExtractor),
    createPdfTextHandler(deps.pdfExtractor),
    createSaveImageHandler(),
    createSaveFileHandler(),
  ]);
}
