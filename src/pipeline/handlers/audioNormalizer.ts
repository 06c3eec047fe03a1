import { spawn } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AudioOutputFormat } from "../../types";

interface FormatSpec {
  codec: string;
  muxer: string;
  extension: string;
  bitrate?: string;
}

export const OUTPUT_FORMATS: Readonly<Record<Exclude<AudioOutputFormat, "original">, FormatSpec>> = {
  mp3: { codec: "libmp3lame", muxer: "mp3", extension: ".mp3", bitrate: "320k" },
  ogg: { codec: "libvorbis", muxer: "ogg", extension: ".ogg", bitrate: "192k" },
  m4a: { codec: "aac", muxer: "ipod", extension: ".m4a", bitrate: "192k" },
  flac: { codec: "flac", muxer: "flac", extension: ".flac" },
  opus: { codec: "libopus", muxer: "opus", extension: ".opus", bitrate: "128k" },
};

const CODEC_BY_EXTENSION: Readonly<Record<string, string>> = {
  ".m4a": "aac",
  ".mp3": "libmp3lame",
  ".ogg": "libvorbis",
  ".flac": "flac",
  ".opus": "libopus",
  ".wav": "pcm_s16le",
};

const LOSSLESS_CODECS = new Set(["flac", "pcm_s16le"]);

export interface NormalizeRequest {
  targetLufs: number;
  bitrate?: string;
  outputFormat: AudioOutputFormat;
}

export interface NormalizeResult {
  outputPath: string;
  inputLoudness?: number;
}

export interface AudioNormalizer {
  normalize(inputPath: string, request: NormalizeRequest): Promise<NormalizeResult>;
}

export function outputPathFor(inputPath: string, outputFormat: AudioOutputFormat): string {
  if (outputFormat === "original") {
    return inputPath;
  }
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${OUTPUT_FORMATS[outputFormat].extension}`);
}

export function buildLoudnormArgs(inputPath: string, outputPath: string, request: NormalizeRequest): string[] {
  let codec: string;
  let muxer: string | undefined;
  let bitrate: string | undefined;

  if (request.outputFormat === "original") {
    codec = CODEC_BY_EXTENSION[path.extname(inputPath).toLowerCase()] ?? "libmp3lame";
    bitrate = LOSSLESS_CODECS.has(codec) ? undefined : (request.bitrate ?? "320k");
  } else {
    const format = OUTPUT_FORMATS[request.outputFormat];
    codec = format.codec;
    muxer = format.muxer;
    bitrate = LOSSLESS_CODECS.has(codec) ? undefined : (request.bitrate ?? format.bitrate);
  }

  const args = [
    "-hide_banner",
    "-nostdin",
    "-y",
    "-i",
    inputPath,
    "-af",
    `loudnorm=I=${request.targetLufs}:TP=-1.5:LRA=11:print_format=json`,
    "-c:a",
    codec,
  ];
  if (bitrate) {
    args.push("-b:a", bitrate);
  }
  if (muxer) {
    args.push("-f", muxer);
  }
  args.push(outputPath);
  return args;
}

export function parseInputLoudness(stderr: string): number | undefined {
  const start = stderr.lastIndexOf("{");
  const end = stderr.lastIndexOf("}");
  if (start < 0 || end < start) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(stderr.slice(start, end + 1));
    if (typeof parsed === "object" && parsed !== null && "input_i" in parsed) {
      const value = Number(parsed.input_i);
      return Number.isFinite(value) ? value : undefined;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function runFfmpeg(ffmpegPath: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(ffmpegPath, args, { stdio: ["ignore", "ignore", "pipe"] });
    let stderr = "";
    proc.stderr.on("data", (chunk) => {
      stderr += String(chunk);
    });
    proc.on("error", reject);
    proc.on("close", (code) => {
      if (code === 0) {
        resolve(stderr);
        return;
      }
      const tail = stderr.trim().split("\n").slice(-3).join(" | ");
      reject(new Error(`ffmpeg exited with code ${code}: ${tail}`));
    });
  });
}

// EBU R128 loudness normalisation through ffmpeg's loudnorm filter.
// Output goes to a temp dir first and only replaces the source once verified non-empty.
export class FfmpegLoudnormNormalizer implements AudioNormalizer {
  private readonly ffmpegPath: string;

  constructor(ffmpegPath = "ffmpeg") {
    this.ffmpegPath = ffmpegPath;
  }

  async normalize(inputPath: string, request: NormalizeRequest): Promise<NormalizeResult> {
    const targetPath = outputPathFor(inputPath, request.outputFormat);
    const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "loudnorm-"));
    const tempOutput = path.join(tmpDir, `norm_${path.basename(targetPath)}`);

    try {
      const stderr = await runFfmpeg(this.ffmpegPath, buildLoudnormArgs(inputPath, tempOutput, request));
      const stat = await fs.promises.stat(tempOutput);
      if (stat.size === 0) {
        throw new Error(`Normalised output for ${path.basename(inputPath)} is empty`);
      }

      // copy + unlink: the temp dir may sit on another filesystem
      await fs.promises.copyFile(tempOutput, targetPath);
      if (targetPath !== inputPath) {
        await fs.promises.rm(inputPath, { force: true });
      }
      return { outputPath: targetPath, inputLoudness: parseInputLoudness(stderr) };
    } finally {
      await fs.promises.rm(tmpDir, { recursive: true, force: true });
    }
  }
}
