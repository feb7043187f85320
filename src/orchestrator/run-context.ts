/**
 * Artifact layout of one run:
 *
 *   <artifactsRoot>/runs/<run_id>/
 *     meta/      case input, intake payloads, registry snapshot, manifest
 *     steps/     <STEP_ID>/output.json, validator.json | agent_error.json
 *     logs/      pipeline.log
 *     exports/   entities.json, relations.json, crossref.json, report.md
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";

export interface RunPaths {
  runId: string;
  runRoot: string;
  metaDir: string;
  stepsDir: string;
  logsDir: string;
  exportsDir: string;
  caseInput: string;
  registry: string;
  manifest: string;
  metaPayload(name: string): string;
  stepDir(stepId: string): string;
  stepOutput(stepId: string): string;
  stepValidator(stepId: string): string;
  stepAgentError(stepId: string): string;
}

export function resolveRunPaths(artifactsRoot: string, runId: string): RunPaths {
  const runRoot = join(artifactsRoot, "runs", runId);
  const metaDir = join(runRoot, "meta");
  const stepsDir = join(runRoot, "steps");
  const stepDir = (stepId: string): string => join(stepsDir, stepId);

  return {
    runId,
    runRoot,
    metaDir,
    stepsDir,
    logsDir: join(runRoot, "logs"),
    exportsDir: join(runRoot, "exports"),
    caseInput: join(metaDir, "case_input.json"),
    registry: join(metaDir, "entity_registry.json"),
    manifest: join(metaDir, "run_manifest.json"),
    metaPayload: (name) => join(metaDir, `${name}.json`),
    stepDir,
    stepOutput: (stepId) => join(stepDir(stepId), "output.json"),
    stepValidator: (stepId) => join(stepDir(stepId), "validator.json"),
    stepAgentError: (stepId) => join(stepDir(stepId), "agent_error.json"),
  };
}

/** Create the run directories; existing ones are kept. */
export function createRunDirs(paths: RunPaths): void {
  for (const dir of [paths.metaDir, paths.stepsDir, paths.logsDir, paths.exportsDir]) {
    mkdirSync(dir, { recursive: true });
  }
}
