/**
 * AG-01 source registry.
 *
 * Offline: lists candidate verification sources (company pages and public
 * registers) for later steps. Performs no requests and makes no claims
 * about the company.
 */

import type { Citation } from "../registry/schema.js";
import type { SourceRegistryOutput } from "../types/pipeline.js";
import { dedupeSources } from "./sources.js";
import { buildStepMeta, formatUtc } from "./step-meta.js";
import type { Agent, AgentInput, AgentResult } from "./types.js";

const PRIMARY_PATHS = ["", "/impressum", "/imprint", "/legal", "/legal-notice", "/about", "/contact"];

const SECONDARY_SOURCES: ReadonlyArray<[publisher: string, url: string]> = [
  ["OpenCorporates", "https://opencorporates.com"],
  ["European Business Register", "https://www.ebr.org"],
  ["North Data", "https://www.northdata.com"],
  ["Handelsregister", "https://www.handelsregister.de"],
  ["Companies House", "https://find-and-update.company-information.service.gov.uk"],
];

export class SourceRegistryAgent implements Agent {
  readonly stepId = "AG-01";
  readonly agentName = "ag01_source_registry";

  async run(input: AgentInput): Promise<AgentResult> {
    const startedAt = input.now();
    const caseNormalized = input.meta.case_normalized;
    if (caseNormalized === undefined || caseNormalized.web_domain_normalized === "") {
      return { ok: false, output: { error: "missing case_normalized from intake" } };
    }

    const accessedAt = formatUtc(startedAt);
    const domain = caseNormalized.web_domain_normalized;
    const publisher = caseNormalized.company_name_canonical || "Official website";

    const primary: Citation[] = PRIMARY_PATHS.map((path) => ({
      publisher,
      url: `https://${domain}${path}`,
      accessed_at_utc: accessedAt,
    }));
    const secondary: Citation[] = SECONDARY_SOURCES.map(([name, url]) => ({
      publisher: name,
      url,
      accessed_at_utc: accessedAt,
    }));

    const output: SourceRegistryOutput = {
      step_meta: buildStepMeta(this.stepId, this.agentName, input, startedAt),
      entities_delta: [],
      relations_delta: [],
      source_registry: { primary_sources: primary, secondary_sources: secondary },
      findings: [
        {
          summary: "Source registry assembled",
          notes: [
            "Primary sources are official web properties of the target.",
            "Secondary sources are public registers used for corroboration.",
            "Sources are verification targets only.",
          ],
        },
      ],
      sources: dedupeSources([...primary, ...secondary]),
    };

    return { ok: true, output };
  }
}
