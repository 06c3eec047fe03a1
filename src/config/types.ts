import { WorkflowSpec } from "../types";

export type SinkType = "local_jsonl" | "http" | "rabbit" | "sqs" | "none";

export interface ImapSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password?: string;
  defaultFolder: string;
}

export interface OutputDirs {
  archive: string;
  manifests: string;
}

export interface AppConfig {
  imap: ImapSettings;
  outputDirs: OutputDirs;
  storePath: string;
  ffmpegPath: string;
  sinkType: SinkType;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
  rabbitUrl?: string;
  sqsQueueUrl?: string;
  ignoreHttpsErrors: boolean;
  workflows: WorkflowSpec[];
}

export type ConfigOverrides = Partial<Omit<AppConfig, "imap" | "outputDirs" | "workflows">> & {
  imap?: Partial<ImapSettings>;
  outputDirs?: Partial<OutputDirs>;
  workflows?: unknown[];
};
