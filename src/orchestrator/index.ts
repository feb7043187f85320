/**
 * Orchestrator: step scheduling, run artifacts and the run entry point.
 */

export { ExitCode } from "./exit-codes.js";
export {
  PipelineHaltError,
  AgentFailureError,
  GatekeeperError,
  ReportError,
} from "./errors.js";
export { resolveRunPaths, createRunDirs, type RunPaths } from "./run-context.js";
export {
  writeJsonAtomic,
  writeTextAtomic,
  readJson,
  toStableJson,
  buildManifestEntry,
  relativeArtifactPath,
  type ManifestEntry,
} from "./artifact-store.js";
export { StepScheduler } from "./scheduler.js";
export {
  runPipeline,
  resolvePipelineVersion,
  type RunPipelineOptions,
  type PipelineRunResult,
  type StepRecord,
} from "./pipeline.js";
