/**
 * Agent contract.
 *
 * One agent per DAG step. The pipeline depends only on this shape, never
 * on how an agent obtains its data.
 */

import type { RegistryDict } from "../registry/schema.js";
import type { JsonObject } from "../types/json.js";
import type { MetaPayloads, StepOutput } from "../types/pipeline.js";

export interface AgentInput {
  runId: string;
  pipelineVersion: string;
  /** The raw case file */
  caseInput: JsonObject;
  /** Intake payloads, limited to what the step's DAG node consumes */
  meta: MetaPayloads;
  /** Snapshot of the registry before this step */
  registry: RegistryDict;
  /** Clock for step_meta and access timestamps */
  now: () => Date;
}

export interface AgentErrorPayload {
  error: string;
  details?: unknown;
}

export type AgentResult =
  | { ok: true; output: StepOutput }
  | { ok: false; output: AgentErrorPayload };

export interface Agent {
  readonly stepId: string;
  readonly agentName: string;
  run(input: AgentInput): Promise<AgentResult>;
}
