export { FfmpegLoudnormNormalizer, OUTPUT_FORMATS, buildLoudnormArgs, outputPathFor, parseInputLoudness } from "./audioNormalizer";
export type { AudioNormalizer, NormalizeRequest, NormalizeResult } from "./audioNormalizer";
export { NormalizeAudioHandler } from "./normalizeAudio";
export { createSaveFileHandler, createSaveImageHandler } from "./saveFile";
export { createDocxTextHandler, createPdfTextExtractor, createPdfTextHandler, extractDocxText } from "./textExtract";
export type { TextExtractor } from "./textExtract";
export { ZIP_HANDLER_NAME, ZipArchiveHandler } from "./zipArchive";
