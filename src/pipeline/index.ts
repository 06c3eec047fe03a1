export { AttachmentPipeline, matchesPatterns, selectProcessor } from "./attachmentPipeline";
export type { PipelineOutcome } from "./attachmentPipeline";
export * from "./handlers";
export { HandlerRegistry, createDefaultRegistry } from "./registry";
export type { RegistryDeps } from "./registry";
export { cleanText, sanitizeForJson, slugify, slugifyFilename } from "./slug";
export type { AttachmentHandler, DispatchOptions, HandlerContext, PipelineStatus } from "./types";
