import path from "node:path";
import { ConfigError, UnknownWorkflowError } from "../core/errors";
import { compileReleasePattern } from "../workflow/classifier";
import {
  AudioOutputFormat,
  CollectionType,
  DuplicateReleasePolicy,
  HandlerOptionValue,
  MergePolicy,
  ProcessorSpec,
  WorkflowSpec,
} from "../types";

const DEFAULT_PRIMARY_PATTERN = "(?:Issue|Episode|Volume|#)\\s*(\\d+)";
const DEFAULT_FOLDER = "[Gmail]/All Mail";
const COLLECTION_TYPES: readonly CollectionType[] = ["bound_volume", "playlist", "named_release"];
const OUTPUT_FORMATS: readonly AudioOutputFormat[] = ["original", "mp3", "ogg", "m4a", "flac", "opus"];
const WORKFLOW_NAME = /^[a-z0-9][a-z0-9_-]*$/;

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(input: Json, key: string, where: string): Json {
  const value = input[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${where}.${key} must be an object`);
  }
  return value;
}

function optionalString(input: Json, key: string, where: string): string | undefined {
  const value = input[key];
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalBoolean(input: Json, key: string, fallback: boolean, where: string): boolean {
  const value = input[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${where}.${key} must be a boolean`);
  }
  return value;
}

function optionalNumber(input: Json, key: string, fallback: number, where: string): number {
  const value = input[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${where}.${key} must be a number`);
  }
  return value;
}

function stringList(input: Json, key: string, where: string): string[] {
  const value = input[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new ConfigError(`${where}.${key} must be an array of strings`);
  }
  return value.filter((item): item is string => typeof item === "string");
}

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T, where: string): T {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigError(`${where} must be one of ${allowed.join(", ")} (got "${value}")`);
  }
  return match;
}

function checkPattern(pattern: string, where: string): string {
  try {
    compileReleasePattern(pattern);
  } catch (error) {
    throw new ConfigError(`${where} is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`);
  }
  return pattern;
}

function checkDate(value: string | undefined, where: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (Number.isNaN(new Date(value).getTime())) {
    throw new ConfigError(`${where} is not a valid date: ${value}`);
  }
  return value;
}

function handlerOptions(input: Json, where: string): Record<string, HandlerOptionValue> {
  const options: Record<string, HandlerOptionValue> = {};
  for (const [key, value] of Object.entries(section(input, "options", where))) {
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new ConfigError(`${where}.options.${key} must be a string, number or boolean`);
    }
    options[key] = value;
  }
  return options;
}

function buildProcessors(raw: unknown, handlerNames: ReadonlySet<string>, where: string): ProcessorSpec[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError(`${where}.processors must be an array`);
  }

  return raw.map((entry, index) => {
    const at = `${where}.processors[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${at} must be an object`);
    }
    const handler = optionalString(entry, "handler", at);
    if (!handler) {
      throw new ConfigError(`${at}.handler is required`);
    }
    if (!handlerNames.has(handler)) {
      throw new ConfigError(`${at}: unknown handler "${handler}". Available: ${[...handlerNames].join(", ")}`);
    }
    const patterns = stringList(entry, "patterns", at);
    if (patterns.length === 0) {
      throw new ConfigError(`${at}.patterns must list at least one file pattern`);
    }
    return {
      name: optionalString(entry, "name", at) ?? handler,
      patterns,
      handler,
      options: handlerOptions(entry, at),
    };
  });
}

function buildMergePolicy(merge: Json, where: string): MergePolicy {
  const kind = oneOf(optionalString(merge, "policy", where), ["expected_count", "quiet_period"] as const, "quiet_period", `${where}.policy`);
  if (kind === "expected_count") {
    const expectedCount = optionalNumber(merge, "expectedCount", 0, where);
    if (!Number.isInteger(expectedCount) || expectedCount < 1) {
      throw new ConfigError(`${where}.expectedCount must be a positive integer`);
    }
    return { kind, expectedCount };
  }

  const quietPeriodMinutes = optionalNumber(merge, "quietPeriodMinutes", 24 * 60, where);
  if (quietPeriodMinutes < 0) {
    throw new ConfigError(`${where}.quietPeriodMinutes must not be negative`);
  }
  return { kind, quietPeriodMinutes };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function buildWorkflowSpec(
  raw: unknown,
  archiveRoot: string,
  handlerNames: ReadonlySet<string>,
  defaultFolder: string = DEFAULT_FOLDER,
): WorkflowSpec {
  if (!isRecord(raw)) {
    throw new ConfigError("workflow entries must be objects");
  }
  const name = optionalString(raw, "name", "workflow");
  if (!name || !WORKFLOW_NAME.test(name)) {
    throw new ConfigError(`workflow.name must match ${WORKFLOW_NAME} (got ${JSON.stringify(raw.name)})`);
  }
  const where = `workflows.${name}`;

  const filters = section(raw, "filters", where);
  const release = section(raw, "release", where);
  const audio = section(raw, "audio", where);
  const merge = section(raw, "merge", where);
  const lyrics = section(raw, "lyrics", where);

  const collectionType = oneOf(
    optionalString(release, "collectionType", `${where}.release`),
    COLLECTION_TYPES,
    "bound_volume",
    `${where}.release.collectionType`,
  );
  const label = optionalString(release, "label", `${where}.release`) ?? "Issue";
  const singleReleaseName = optionalString(release, "singleReleaseName", `${where}.release`);
  if (collectionType === "playlist" && !singleReleaseName) {
    throw new ConfigError(`${where}.release.singleReleaseName is required for playlist collections`);
  }
  const fallbackPattern = optionalString(release, "fallbackPattern", `${where}.release`);

  const spec: WorkflowSpec = {
    name,
    description: optionalString(raw, "description", where) ?? "",
    mailboxFolder: optionalString(raw, "folder", where) ?? defaultFolder,
    archiveDir: path.resolve(archiveRoot, optionalString(raw, "archiveDir", where) ?? name),
    filters: {
      sender: optionalString(filters, "sender", `${where}.filters`),
      subjectContains: optionalString(filters, "subjectContains", `${where}.filters`),
      afterDate: checkDate(optionalString(filters, "afterDate", `${where}.filters`), `${where}.filters.afterDate`),
      beforeDate: checkDate(optionalString(filters, "beforeDate", `${where}.filters`), `${where}.filters.beforeDate`),
      requireAttachments: optionalBoolean(filters, "requireAttachments", false, `${where}.filters`),
      excludePatterns: stringList(filters, "excludePatterns", `${where}.filters`),
    },
    release: {
      collectionType,
      primaryPattern: checkPattern(
        optionalString(release, "primaryPattern", `${where}.release`) ?? DEFAULT_PRIMARY_PATTERN,
        `${where}.release.primaryPattern`,
      ),
      fallbackPattern: fallbackPattern === undefined ? undefined : checkPattern(fallbackPattern, `${where}.release.fallbackPattern`),
      searchBody: optionalBoolean(release, "searchBody", false, `${where}.release`),
      folderTemplate: optionalString(release, "folderTemplate", `${where}.release`) ?? `${label}_{number}`,
      label,
      singleReleaseName,
      onDuplicate: oneOf<DuplicateReleasePolicy>(
        optionalString(release, "onDuplicate", `${where}.release`),
        ["flag", "overwrite"],
        "flag",
        `${where}.release.onDuplicate`,
      ),
    },
    processors: buildProcessors(raw.processors, handlerNames, where),
    audio: {
      normalize: optionalBoolean(audio, "normalize", true, `${where}.audio`),
      targetLufs: optionalNumber(audio, "targetLufs", -16, `${where}.audio`),
      bitrate: optionalString(audio, "bitrate", `${where}.audio`) ?? "320k",
      outputFormat: oneOf(optionalString(audio, "outputFormat", `${where}.audio`), OUTPUT_FORMATS, "original", `${where}.audio.outputFormat`),
    },
    merge: {
      enabled: optionalBoolean(merge, "enabled", false, `${where}.merge`),
      policy: buildMergePolicy(merge, `${where}.merge`),
    },
    lyrics: {
      extractFromDocx: optionalBoolean(lyrics, "extractFromDocx", true, `${where}.lyrics`),
      fieldName: optionalString(lyrics, "fieldName", `${where}.lyrics`) ?? "lyrics",
    },
  };

  if (!spec.release.folderTemplate.includes("{number}") && collectionType === "bound_volume") {
    throw new ConfigError(`${where}.release.folderTemplate must contain {number}`);
  }

  return deepFreeze(spec);
}

export function buildWorkflows(
  raw: unknown[],
  archiveRoot: string,
  handlerNames: ReadonlySet<string>,
  defaultFolder: string = DEFAULT_FOLDER,
): WorkflowSpec[] {
  const workflows = raw.map((entry) => buildWorkflowSpec(entry, archiveRoot, handlerNames, defaultFolder));
  const seen = new Set<string>();
  for (const workflow of workflows) {
    if (seen.has(workflow.name)) {
      throw new ConfigError(`Duplicate workflow name: ${workflow.name}`);
    }
    seen.add(workflow.name);
  }
  return workflows;
}

export function findWorkflow(workflows: readonly WorkflowSpec[], name: string): WorkflowSpec {
  const workflow = workflows.find((candidate) => candidate.name === name);
  if (!workflow) {
    throw new UnknownWorkflowError(
      name,
      workflows.map((candidate) => candidate.name),
    );
  }
  return workflow;
}
