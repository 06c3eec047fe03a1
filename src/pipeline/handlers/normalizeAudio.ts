import { AudioOutputFormat, AttachmentResult, HandlerOptions, RawAttachment } from "../../types";
import { AttachmentHandler, HandlerContext } from "../types";
import { AudioNormalizer } from "./audioNormalizer";
import { numberOption, saveAttachment, stringOption, toResult } from "./common";

const FORMATS: ReadonlySet<string> = new Set(["original", "mp3", "ogg", "m4a", "flac", "opus"]);

function isOutputFormat(value: string | undefined): value is AudioOutputFormat {
  return value !== undefined && FORMATS.has(value);
}

export class NormalizeAudioHandler implements AttachmentHandler {
  readonly name = "normalize_audio";
  readonly kind = "audio" as const;
  private readonly normalizer: AudioNormalizer;

  constructor(normalizer: AudioNormalizer) {
    this.normalizer = normalizer;
  }

  async handle(attachment: RawAttachment, targetDir: string, options: HandlerOptions, context: HandlerContext): Promise<AttachmentResult[]> {
    const saved = await saveAttachment(attachment, targetDir);
    const audio = context.workflow.audio;
    if (!audio.normalize) {
      return [await toResult(saved, this.name, this.kind, context.releaseDir, { normalized: false })];
    }

    const requestedFormat = stringOption(options, "output_format");
    const outputFormat = isOutputFormat(requestedFormat) ? requestedFormat : audio.outputFormat;
    const targetLufs = numberOption(options, "target_lufs") ?? audio.targetLufs;
    const bitrate = stringOption(options, "bitrate") ?? audio.bitrate;

    const normalized = await this.normalizer.normalize(saved.filePath, { targetLufs, bitrate, outputFormat });
    context.logger.info("audio_normalized", {
      filename: saved.original,
      output: normalized.outputPath,
      targetLufs,
      inputLoudness: normalized.inputLoudness,
    });

    return [
      await toResult({ ...saved, filePath: normalized.outputPath }, this.name, this.kind, context.releaseDir, {
        normalized: true,
        targetLufs,
        outputFormat,
        bitrate,
        ...(normalized.inputLoudness !== undefined ? { inputLoudness: normalized.inputLoudness } : {}),
      }),
    ];
  }
}
