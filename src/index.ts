/**
 * Company intelligence pipeline.
 *
 * Library entry point. The CLIs in src/cli/ are thin wrappers around
 * runPipeline and the configuration loaders exported here.
 */

export * from "./registry/index.js";
export * from "./contracts/index.js";
export * from "./types/index.js";
export * from "./agents/index.js";
export * from "./orchestrator/index.js";
export * from "./exporters/index.js";
export {
  config,
  loadConfig,
  validateConfig,
  ConfigError,
  VERSION_ENV_KEYS,
  type AppConfig,
} from "./config/index.js";
export * from "./config/pipeline/index.js";
export {
  createLogger,
  parseLogLevel,
  initRunId,
  getRunId,
  generateRunId,
  type Logger,
  type LogLevel,
} from "./logging/index.js";
