export type CollectionType = "bound_volume" | "playlist" | "named_release";

export type AudioOutputFormat = "original" | "mp3" | "ogg" | "m4a" | "flac" | "opus";

export type DuplicateReleasePolicy = "flag" | "overwrite";

export type HandlerOptionValue = string | number | boolean;

export type HandlerOptions = Readonly<Record<string, HandlerOptionValue>>;

export interface FilterRules {
  readonly sender?: string;
  readonly subjectContains?: string;
  readonly afterDate?: string;
  readonly beforeDate?: string;
  readonly requireAttachments: boolean;
  readonly excludePatterns: readonly string[];
}

export interface ReleaseRules {
  readonly collectionType: CollectionType;
  readonly primaryPattern: string;
  readonly fallbackPattern?: string;
  readonly searchBody: boolean;
  readonly folderTemplate: string;
  readonly label: string;
  readonly singleReleaseName?: string;
  readonly onDuplicate: DuplicateReleasePolicy;
}

export interface ProcessorSpec {
  readonly name: string;
  readonly patterns: readonly string[];
  readonly handler: string;
  readonly options: HandlerOptions;
}

export interface AudioOptions {
  readonly normalize: boolean;
  readonly targetLufs: number;
  readonly bitrate: string;
  readonly outputFormat: AudioOutputFormat;
}

export type MergePolicy =
  | { readonly kind: "expected_count"; readonly expectedCount: number }
  | { readonly kind: "quiet_period"; readonly quietPeriodMinutes: number };

export interface MergeOptions {
  readonly enabled: boolean;
  readonly policy: MergePolicy;
}

export interface LyricsOptions {
  readonly extractFromDocx: boolean;
  readonly fieldName: string;
}

export interface WorkflowSpec {
  readonly name: string;
  readonly description: string;
  readonly mailboxFolder: string;
  readonly archiveDir: string;
  readonly filters: FilterRules;
  readonly release: ReleaseRules;
  readonly processors: readonly ProcessorSpec[];
  readonly audio: AudioOptions;
  readonly merge: MergeOptions;
  readonly lyrics: LyricsOptions;
}
