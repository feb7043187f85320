/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { isLogLevel, LOG_LEVELS } from "../logging/logger.js";
import { ConfigError, optionalEnv, optionalEnvBool, firstEnv } from "./env.js";

export { ConfigError } from "./env.js";

export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Root directory under which `runs/<run_id>/` is created */
  readonly artifactsRoot: string;
  /** DAG definition file */
  readonly dagPath: string;
  /** Step contract file */
  readonly contractsPath: string;
  /** Pipeline version from PIPELINE_VERSION or GIT_SHA, if either is set */
  readonly pipelineVersion: string | undefined;
}

export const VERSION_ENV_KEYS = ["PIPELINE_VERSION", "GIT_SHA"] as const;

/**
 * Load application configuration from the environment.
 * Every value has a default except the pipeline version, which is resolved
 * per run (see orchestrator/pipeline).
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    artifactsRoot: optionalEnv("ARTIFACTS_ROOT", "artifacts"),
    dagPath: optionalEnv("PIPELINE_DAG_PATH", "configs/pipeline/dag.json"),
    contractsPath: optionalEnv(
      "STEP_CONTRACTS_PATH",
      "configs/pipeline/step-contracts.json"
    ),
    pipelineVersion: firstEnv(VERSION_ENV_KEYS),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have a closed set of options.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }
}
