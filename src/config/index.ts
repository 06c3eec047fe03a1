export * from "./types";
export { DEFAULT_CONFIG, loadConfig, parseConfigOverrides, withArchiveRoot } from "./loadConfig";
export { buildWorkflowSpec, buildWorkflows, findWorkflow } from "./workflows";
