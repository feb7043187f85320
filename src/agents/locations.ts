/**
 * AG-12 locations and sites.
 *
 * Emits one site entity per cited site in the case file (`sites`) and an
 * operates_at relation from the target to each. The search attempt is
 * always recorded, so a "nothing found" result stays auditable.
 */

import { z } from "zod";
import { TARGET_ENTITY_ID } from "../registry/id-allocator.js";
import { PLACEHOLDER, type Citation, type EntityPayload, type RelationPayload } from "../registry/schema.js";
import type { LocationsOutput } from "../types/pipeline.js";
import { dedupeSources, parseCitation } from "./sources.js";
import { buildStepMeta, formatUtc } from "./step-meta.js";
import type { Agent, AgentInput, AgentResult } from "./types.js";

const SiteInputSchema = z.object({
  name: z.string().trim().min(1),
  site_type: z.string().trim().min(1).optional(),
  country_region: z.string().trim().min(1).optional(),
  city: z.string().trim().min(1).optional(),
  source: z.unknown().optional(),
});

export function siteSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export class LocationsAgent implements Agent {
  readonly stepId = "AG-12";
  readonly agentName = "ag12_locations_sites";

  async run(input: AgentInput): Promise<AgentResult> {
    const startedAt = input.now();
    const stub = input.meta.target_entity_stub;
    if (stub === undefined) {
      return { ok: false, output: { error: "missing target_entity_stub from intake" } };
    }

    const accessedAt = formatUtc(startedAt);
    const rawSites = input.caseInput["sites"];
    const entities: EntityPayload[] = [];
    const relations: RelationPayload[] = [];
    const citations: Citation[] = [];

    for (const raw of Array.isArray(rawSites) ? rawSites : []) {
      const site = SiteInputSchema.safeParse(raw);
      if (!site.success) {
        continue;
      }
      const citation = parseCitation(site.data.source, accessedAt);
      if (citation === null) {
        continue;
      }
      const entityKey = `${stub.entity_key}#site:${siteSlug(site.data.name)}`;
      entities.push({
        entity_type: "site",
        entity_key: entityKey,
        entity_name: site.data.name,
        site_type: site.data.site_type ?? PLACEHOLDER,
        country_region: site.data.country_region ?? PLACEHOLDER,
        city: site.data.city ?? PLACEHOLDER,
        sources: [citation],
      });
      relations.push({
        source_id: TARGET_ENTITY_ID,
        relation_type: "operates_at",
        target_key: entityKey,
        evidence: [citation],
      });
      citations.push(citation);
    }

    const output: LocationsOutput = {
      step_meta: buildStepMeta(this.stepId, this.agentName, input, startedAt),
      entities_delta: entities,
      relations_delta: relations,
      findings: [
        entities.length === 0
          ? { summary: "No evidence of operating sites found (n/v)." }
          : { summary: `${entities.length} cited site(s) recorded` },
      ],
      sources: dedupeSources(citations),
      search_attempts: [
        {
          query: `${stub.domain} sites and locations`,
          result: entities.length === 0 ? "no cited sites in case input" : `${entities.length} cited site(s)`,
        },
      ],
    };

    return { ok: true, output };
  }
}
