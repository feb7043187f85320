/**
 * AG-11 company size.
 *
 * Builds a company_size_profile for the target from size signals in the
 * case file (`company_size`). Signals are only kept when the case file
 * cites a source for them.
 */

import { z } from "zod";
import { TARGET_ENTITY_ID } from "../registry/id-allocator.js";
import { PLACEHOLDER, type Citation } from "../registry/schema.js";
import type { CompanySizeOutput } from "../types/pipeline.js";
import { parseCitation } from "./sources.js";
import { buildStepMeta, formatUtc } from "./step-meta.js";
import type { Agent, AgentInput, AgentResult } from "./types.js";

export const SIZE_FIELDS = [
  "annual_revenue_eur",
  "employee_count",
  "number_of_production_sites",
  "mro_inventory_value_eur",
  "ppe_value_eur",
] as const;

const CompanySizeInputSchema = z
  .object({
    industry: z.string().optional(),
    source: z.unknown().optional(),
  })
  .catchall(z.unknown());

type CompanySizeInput = z.infer<typeof CompanySizeInputSchema>;

/** Numbers and numeric strings become numbers; anything else is n/v. */
function toNumber(value: unknown): number | typeof PLACEHOLDER {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return PLACEHOLDER;
}

export class CompanySizeAgent implements Agent {
  readonly stepId = "AG-11";
  readonly agentName = "ag11_company_size";

  async run(input: AgentInput): Promise<AgentResult> {
    const startedAt = input.now();
    const stub = input.meta.target_entity_stub;
    if (stub === undefined) {
      return { ok: false, output: { error: "missing target_entity_stub from intake" } };
    }

    const parsed = CompanySizeInputSchema.safeParse(input.caseInput["company_size"] ?? {});
    const evidence: CompanySizeInput = parsed.success ? parsed.data : {};
    const citation = parseCitation(evidence["source"], formatUtc(startedAt));

    const metrics: Record<string, number | string> = {};
    for (const field of SIZE_FIELDS) {
      metrics[field] = citation === null ? PLACEHOLDER : toNumber(evidence[field]);
    }

    const cited = Object.values(metrics).some((value) => value !== PLACEHOLDER);
    const sources: Citation[] = cited && citation !== null ? [citation] : [];
    const profile = {
      industry: evidence["industry"] ?? PLACEHOLDER,
      quantitative_metrics: metrics,
    };

    const output: CompanySizeOutput = {
      step_meta: buildStepMeta(this.stepId, this.agentName, input, startedAt),
      entities_delta: [
        {
          entity_id: TARGET_ENTITY_ID,
          entity_type: stub.entity_type,
          entity_name: stub.entity_name,
          domain: stub.domain,
          entity_key: stub.entity_key,
          attributes: { company_size_profile: profile },
          sources,
        },
      ],
      relations_delta: [],
      findings: [
        {
          summary: cited ? "Company size profile assembled" : "No verifiable company size evidence found (n/v).",
          notes: { quantitative_metrics: metrics },
        },
      ],
      sources,
      company_size_profile: profile,
    };

    return { ok: true, output };
  }
}
