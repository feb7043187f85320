/**
 * Logging and run tracing.
 */

export { generateRunId, initRunId, getRunId, isValidRunId } from "./run-id.js";
export {
  createLogger,
  isLogLevel,
  parseLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
