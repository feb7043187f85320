/**
 * Generic research agent for steps without their own rules.
 *
 * Emits the common envelope with empty deltas. Research that needs outside
 * access is not part of the offline pipeline; the finding records that
 * nothing was verified.
 */

import type { StepOutputEnvelope } from "../types/pipeline.js";
import { buildStepMeta } from "./step-meta.js";
import type { Agent, AgentInput, AgentResult } from "./types.js";

export class ResearchAgent implements Agent {
  constructor(
    readonly stepId: string,
    readonly agentName: string,
    readonly topic: string
  ) {}

  async run(input: AgentInput): Promise<AgentResult> {
    const startedAt = input.now();
    const target = input.meta.case_normalized?.company_name_canonical ?? "target";

    const output: StepOutputEnvelope = {
      step_meta: buildStepMeta(this.stepId, this.agentName, input, startedAt),
      entities_delta: [],
      relations_delta: [],
      findings: [{ summary: `${this.topic}: no verified findings for ${target} (n/v).` }],
      sources: [],
    };

    return { ok: true, output };
  }
}
