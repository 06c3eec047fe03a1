import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { AppConfig, ConfigOverrides, SinkType } from "./types";
import { buildWorkflows } from "./workflows";

const DEFAULT_CONFIG_FILE = "archiver.config.json";

const DEFAULT_CONFIG: AppConfig = {
  imap: {
    host: "imap.gmail.com",
    port: 993,
    secure: true,
    user: "",
    password: undefined,
    defaultFolder: "[Gmail]/All Mail",
  },
  outputDirs: {
    archive: "archive",
    manifests: "data/manifests",
  },
  storePath: "data/ledger.sqlite",
  ffmpegPath: "ffmpeg",
  sinkType: "local_jsonl",
  httpSinkEndpoint: undefined,
  httpSinkToken: undefined,
  rabbitUrl: undefined,
  sqsQueueUrl: undefined,
  ignoreHttpsErrors: false,
  workflows: [],
};

const SINK_TYPES: readonly SinkType[] = ["local_jsonl", "http", "rabbit", "sqs", "none"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type ScalarType = "string" | "number" | "boolean";

const TOP_LEVEL_TYPES: Record<string, ScalarType> = {
  storePath: "string",
  ffmpegPath: "string",
  sinkType: "string",
  httpSinkEndpoint: "string",
  httpSinkToken: "string",
  rabbitUrl: "string",
  sqsQueueUrl: "string",
  ignoreHttpsErrors: "boolean",
};

const IMAP_TYPES: Record<string, ScalarType> = {
  host: "string",
  port: "number",
  secure: "boolean",
  user: "string",
  password: "string",
  defaultFolder: "string",
};

const OUTPUT_DIR_TYPES: Record<string, ScalarType> = { archive: "string", manifests: "string" };

function checkScalars(section: Record<string, unknown>, types: Record<string, ScalarType>, where: string): void {
  for (const [key, expected] of Object.entries(types)) {
    const value = section[key];
    if (value !== undefined && typeof value !== expected) {
      throw new ConfigError(`${where}${key} must be a ${expected}`);
    }
  }
}

export function parseConfigOverrides(raw: string, source: string): ConfigOverrides {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${source} must contain a JSON object`);
  }
  if (parsed.workflows !== undefined && !Array.isArray(parsed.workflows)) {
    throw new ConfigError(`Config file ${source}: workflows must be an array`);
  }
  if (parsed.imap !== undefined && !isRecord(parsed.imap)) {
    throw new ConfigError(`Config file ${source}: imap must be an object`);
  }
  if (parsed.outputDirs !== undefined && !isRecord(parsed.outputDirs)) {
    throw new ConfigError(`Config file ${source}: outputDirs must be an object`);
  }
  checkScalars(parsed, TOP_LEVEL_TYPES, `Config file ${source}: `);
  checkScalars(isRecord(parsed.imap) ? parsed.imap : {}, IMAP_TYPES, `Config file ${source}: imap.`);
  checkScalars(isRecord(parsed.outputDirs) ? parsed.outputDirs : {}, OUTPUT_DIR_TYPES, `Config file ${source}: outputDirs.`);
  return parsed as ConfigOverrides;
}

function readConfigFile(configPath?: string): ConfigOverrides {
  const candidate = configPath ?? DEFAULT_CONFIG_FILE;
  const absolutePath = path.resolve(candidate);
  if (!fs.existsSync(absolutePath)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    return {};
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  return parseConfigOverrides(raw, absolutePath);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toSinkType(value: string): SinkType {
  const normalized = value.trim().toLowerCase();
  const sinkType = SINK_TYPES.find((candidate) => candidate === normalized);
  if (!sinkType) {
    throw new ConfigError(`Unsupported sink type: ${value}`);
  }
  return sinkType;
}

export function loadConfig(
  configPath: string | undefined,
  handlerNames: ReadonlySet<string>,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const fileConfig = readConfigFile(configPath);
  const { workflows: rawWorkflows, ...fileSettings } = fileConfig;

  const merged = {
    ...DEFAULT_CONFIG,
    ...fileSettings,
    imap: {
      ...DEFAULT_CONFIG.imap,
      ...(fileConfig.imap ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  const archiveRoot = env.ARCHIVE_ROOT ?? merged.outputDirs.archive;
  const imap = {
    host: env.IMAP_HOST ?? merged.imap.host,
    port: toInt(env.IMAP_PORT, merged.imap.port),
    secure: toBool(env.IMAP_SECURE, merged.imap.secure),
    user: env.IMAP_USER ?? merged.imap.user,
    password: env.IMAP_PASSWORD ?? merged.imap.password,
    defaultFolder: env.IMAP_DEFAULT_FOLDER ?? merged.imap.defaultFolder,
  };

  return {
    ...merged,
    imap,
    outputDirs: {
      archive: archiveRoot,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
    storePath: env.STORE_PATH ?? merged.storePath,
    ffmpegPath: env.FFMPEG_PATH ?? merged.ffmpegPath,
    sinkType: toSinkType(env.SINK_TYPE ?? merged.sinkType),
    httpSinkEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
    rabbitUrl: env.RABBIT_URL ?? merged.rabbitUrl,
    sqsQueueUrl: env.SQS_QUEUE_URL ?? merged.sqsQueueUrl,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    workflows: buildWorkflows(rawWorkflows ?? [], archiveRoot, handlerNames, imap.defaultFolder),
  };
}

// Points every workflow at <root>/<workflow name>; used so dry runs never touch the real archive.
export function withArchiveRoot(config: AppConfig, root: string): AppConfig {
  return {
    ...config,
    outputDirs: { ...config.outputDirs, archive: root },
    workflows: config.workflows.map((workflow) => Object.freeze({ ...workflow, archiveDir: path.resolve(root, workflow.name) })),
  };
}

export { DEFAULT_CONFIG };
