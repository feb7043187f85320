/**
 * AG-00 intake normalization.
 *
 * Canonicalizes the company name and web domain from the case file,
 * derives the target's entity key and publishes `case_normalized` and
 * `target_entity_stub` for later steps.
 */

import { buildEntityKey, normalizeDomain, normalizeWhitespace } from "../registry/entity-key.js";
import { TARGET_ENTITY_ID } from "../registry/id-allocator.js";
import { isValidDomain } from "../contracts/patterns.js";
import { firstString } from "../types/json.js";
import type { CaseNormalized, IntakeOutput, TargetEntityStub } from "../types/pipeline.js";
import { buildStepMeta } from "./step-meta.js";
import type { Agent, AgentInput, AgentResult } from "./types.js";

/** Accepted spellings of the name and domain fields in case files. */
export const NAME_KEYS = ["company_name", "legal_name", "company"] as const;
export const DOMAIN_KEYS = ["web_domain", "company_domain", "company_web_domain", "domain"] as const;

export class IntakeAgent implements Agent {
  readonly stepId = "AG-00";
  readonly agentName = "ag00_intake_normalization";

  async run(input: AgentInput): Promise<AgentResult> {
    const startedAt = input.now();
    const rawName = firstString(input.caseInput, NAME_KEYS);
    const rawDomain = firstString(input.caseInput, DOMAIN_KEYS);

    if (rawName === "" || rawDomain === "") {
      return {
        ok: false,
        output: {
          error: "case file needs a company name and a web domain",
          details: { name_keys: NAME_KEYS, domain_keys: DOMAIN_KEYS },
        },
      };
    }

    const companyName = normalizeWhitespace(rawName);
    const domain = normalizeDomain(rawDomain);
    const entityKey = buildEntityKey(domain, companyName);

    const caseNormalized: CaseNormalized = {
      company_name_canonical: companyName,
      web_domain_normalized: domain,
      entity_key: entityKey,
      domain_valid: isValidDomain(domain),
    };

    const stub: TargetEntityStub = {
      entity_type: "target_company",
      entity_name: companyName,
      domain,
      entity_key: entityKey,
    };

    const output: IntakeOutput = {
      step_meta: buildStepMeta(this.stepId, this.agentName, input, startedAt),
      case_normalized: caseNormalized,
      target_entity_stub: stub,
      entities_delta: [{ entity_id: TARGET_ENTITY_ID, ...stub }],
      relations_delta: [],
      findings: [
        {
          summary: "Intake normalized",
          notes: {
            company_name_input: rawName,
            web_domain_input: rawDomain,
            domain_valid: caseNormalized.domain_valid,
          },
        },
      ],
      sources: [],
    };

    return { ok: true, output };
  }
}
