/**
 * step_meta construction shared by all agents.
 */

import type { StepMeta } from "../types/pipeline.js";
import type { AgentInput } from "./types.js";

/** `YYYY-MM-DDTHH:MM:SSZ` */
export function formatUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function buildStepMeta(
  stepId: string,
  agentName: string,
  input: AgentInput,
  startedAt: Date
): StepMeta {
  return {
    step_id: stepId,
    agent_name: agentName,
    run_id: input.runId,
    started_at_utc: formatUtc(startedAt),
    finished_at_utc: formatUtc(input.now()),
    pipeline_version: input.pipelineVersion,
  };
}
