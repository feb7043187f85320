/**
 * AG-10 identity and legal.
 *
 * Mirrors legal identity evidence supplied in the case file
 * (`legal_identity`). A value is only emitted together with a citation;
 * without one every field stays "n/v".
 */

import { z } from "zod";
import { TARGET_ENTITY_ID } from "../registry/id-allocator.js";
import { PLACEHOLDER, isPlaceholder, type Citation } from "../registry/schema.js";
import { isRecord } from "../types/json.js";
import type { IdentityLegalOutput } from "../types/pipeline.js";
import { parseCitation } from "./sources.js";
import { buildStepMeta, formatUtc } from "./step-meta.js";
import type { Agent, AgentInput, AgentResult } from "./types.js";

export const LEGAL_FIELDS = ["legal_name", "legal_form", "founding_year", "registration_signals"] as const;
export type LegalField = (typeof LEGAL_FIELDS)[number];

const LegalIdentityInputSchema = z.object({
  legal_name: z.string().optional(),
  legal_form: z.string().optional(),
  founding_year: z.union([z.number().int(), z.string()]).optional(),
  registration_signals: z.union([z.string(), z.array(z.string())]).optional(),
  source: z.unknown().optional(),
});

type LegalIdentityInput = z.infer<typeof LegalIdentityInputSchema>;

export class IdentityLegalAgent implements Agent {
  readonly stepId = "AG-10";
  readonly agentName = "ag10_identity_legal";

  async run(input: AgentInput): Promise<AgentResult> {
    const startedAt = input.now();
    const stub = input.meta.target_entity_stub;
    if (stub === undefined) {
      return { ok: false, output: { error: "missing target_entity_stub from intake" } };
    }

    const parsed = LegalIdentityInputSchema.safeParse(input.caseInput["legal_identity"] ?? {});
    const evidence: LegalIdentityInput = parsed.success ? parsed.data : {};
    const citation = parseCitation(evidence.source, formatUtc(startedAt));

    const values: Record<LegalField, unknown> = {
      legal_name: PLACEHOLDER,
      legal_form: PLACEHOLDER,
      founding_year: PLACEHOLDER,
      registration_signals: PLACEHOLDER,
    };
    const fieldSources: Record<string, Array<{ url: string }>> = {};
    const sources: Citation[] = [];

    if (citation !== null && citation.url !== undefined) {
      for (const field of LEGAL_FIELDS) {
        const value = evidence[field];
        if (!isPlaceholder(value)) {
          values[field] = value;
          fieldSources[field] = [{ url: citation.url }];
        }
      }
      if (Object.keys(fieldSources).length > 0) {
        sources.push(citation);
      }
    }

    const found = Object.keys(fieldSources);
    const output: IdentityLegalOutput = {
      step_meta: buildStepMeta(this.stepId, this.agentName, input, startedAt),
      entities_delta: [
        {
          entity_id: TARGET_ENTITY_ID,
          entity_type: stub.entity_type,
          entity_name: stub.entity_name,
          domain: stub.domain,
          entity_key: stub.entity_key,
          ...values,
          sources,
        },
      ],
      relations_delta: [],
      findings: [
        found.length === 0
          ? { summary: "No verifiable identity/contact evidence found (n/v)." }
          : { summary: "Legal identity mirrored from cited evidence", notes: { fields: found } },
      ],
      sources,
      field_sources: fieldSources,
    };

    if (!parsed.success && isRecord(input.caseInput["legal_identity"])) {
      output.findings.push({
        summary: "legal_identity in the case file was ignored",
        notes: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }

    return { ok: true, output };
  }
}
