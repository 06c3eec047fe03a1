export { classifyRelease, compileReleasePattern, renderFolderName } from "./classifier";
export type { ClassificationResult, ClassifyOptions, ReleaseTarget } from "./classifier";
export { describeMismatch, matchesCriteria } from "./criteria";
export type { MismatchReason } from "./criteria";
export { FragmentMerger, fragmentToCandidate } from "./fragments";
export type { MergedFragments } from "./fragments";
export { WorkflowRunner, emptySummary } from "./runner";
export type { ProcessOneTarget, RunOptions, WorkflowRunnerDeps } from "./runner";
