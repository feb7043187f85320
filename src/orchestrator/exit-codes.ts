/**
 * Process exit codes of a pipeline run.
 */
export const ExitCode = {
  OK: 0,
  /** DAG, contracts, registry or environment misconfigured */
  CONFIG: 1,
  /** An agent reported failure (ok: false) or threw */
  AGENT_FAILED: 2,
  /** The gatekeeper rejected a step output */
  GATEKEEPER: 3,
  /** Export or report building failed */
  REPORT: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
