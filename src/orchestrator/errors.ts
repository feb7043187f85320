/**
 * Errors that halt a pipeline run. Each carries the exit code the CLI
 * returns for it.
 */

import { ExitCode } from "./exit-codes.js";
import type { ValidationIssue } from "../contracts/issues.js";

export class PipelineHaltError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode,
    public readonly stepId?: string
  ) {
    super(message);
    this.name = "PipelineHaltError";
  }
}

export class AgentFailureError extends PipelineHaltError {
  constructor(
    stepId: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(`Agent for ${stepId} failed: ${message}`, ExitCode.AGENT_FAILED, stepId);
    this.name = "AgentFailureError";
  }
}

export class GatekeeperError extends PipelineHaltError {
  constructor(
    stepId: string,
    public readonly errors: readonly ValidationIssue[]
  ) {
    super(
      `Gatekeeper rejected ${stepId}: ${errors.length} error(s)`,
      ExitCode.GATEKEEPER,
      stepId
    );
    this.name = "GatekeeperError";
  }
}

export class ReportError extends PipelineHaltError {
  constructor(message: string) {
    super(`Export failed: ${message}`, ExitCode.REPORT);
    this.name = "ReportError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
