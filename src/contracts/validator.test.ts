/**
 * Contract gatekeeper tests.
 *
 * Run with: node --import tsx --test src/contracts/validator.test.ts
 *
 * Covers:
 *   1. Stage short-circuit (sections → shapes → step_meta → rules)
 *   2. step_meta format checks
 *   3. Rules per contract kind, including evidence gating
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { StepContractSchema, type StepContract } from "../config/pipeline/schema.js";
import { validateStepOutput } from "./validator.js";
import type { ValidationContext } from "./stages.js";
import type { JsonObject } from "../types/json.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const ENVELOPE = ["step_meta", "entities_delta", "relations_delta", "findings", "sources"];
const NOW = new Date("2024-06-01T12:00:00Z");

function contract(stepId: string, kind: string, extra: JsonObject = {}): StepContract {
  return StepContractSchema.parse({
    step_id: stepId,
    kind,
    required_sections: [...ENVELOPE, ...(Array.isArray(extra["sections"]) ? extra["sections"] : [])],
  });
}

function ctx(stepContract: StepContract, extra: Partial<ValidationContext> = {}): ValidationContext {
  return { stepId: stepContract.step_id, contract: stepContract, now: NOW, ...extra };
}

function stepMeta(stepId: string, overrides: JsonObject = {}): JsonObject {
  return {
    step_id: stepId,
    agent_name: "test_agent",
    run_id: "run-test",
    started_at_utc: "2024-06-01T10:00:00Z",
    finished_at_utc: "2024-06-01T10:00:05Z",
    pipeline_version: "1.0.0",
    ...overrides,
  };
}

function envelope(stepId: string, overrides: JsonObject = {}): JsonObject {
  return {
    step_meta: stepMeta(stepId),
    entities_delta: [],
    relations_delta: [],
    findings: [],
    sources: [],
    ...overrides,
  };
}

const IMPRESSUM = {
  publisher: "Acme GmbH",
  url: "https://www.acme.com/impressum",
  accessed_at_utc: "2024-06-01T10:00:00Z",
};

function codes(issues: Array<{ code: string }>): string[] {
  return issues.map((i) => i.code);
}

// ═══════════════════════════════════════════════════════════════════════════
// STAGES
// ═══════════════════════════════════════════════════════════════════════════

describe("stage short-circuit", () => {
  const research = contract("AG-30", "research");

  test("missing sections stop validation before step_meta checks", () => {
    const result = validateStepOutput({ step_meta: { step_id: "AG-99" } }, ctx(research));
    assert.equal(result.ok, false);
    assert.deepEqual(result.errors, [
      { code: "missing_required_sections", message: "Missing required section: entities_delta", path: "$.entities_delta" },
      { code: "missing_required_sections", message: "Missing required section: relations_delta", path: "$.relations_delta" },
      { code: "missing_required_sections", message: "Missing required section: findings", path: "$.findings" },
      { code: "missing_required_sections", message: "Missing required section: sources", path: "$.sources" },
    ]);
  });

  test("wrong section types stop validation before step_meta checks", () => {
    const result = validateStepOutput(
      envelope("AG-30", { findings: "none", step_meta: stepMeta("AG-99") }),
      ctx(research)
    );
    assert.deepEqual(codes(result.errors), ["invalid_section_type"]);
    assert.equal(result.errors[0]?.path, "$.findings");
  });

  test("malformed delta elements stop validation before step_meta checks", () => {
    const result = validateStepOutput(
      envelope("AG-30", {
        step_meta: stepMeta("AG-99"),
        entities_delta: [null, { entity_key: 42 }, { entity_type: "customer", domain: "ok.example" }],
        relations_delta: [{ source_id: "TGT-001", evidence: "none" }],
      }),
      ctx(research)
    );
    assert.equal(result.ok, false);
    assert.deepEqual(result.errors, [
      {
        code: "invalid_section_type",
        message: "entities_delta[0] is not a valid entity payload: Expected object, received null",
        path: "$.entities_delta[0]",
      },
      {
        code: "invalid_section_type",
        message: "entities_delta[1] is not a valid entity payload: entity_key: Expected string, received number",
        path: "$.entities_delta[1]",
      },
      {
        code: "invalid_section_type",
        message: "relations_delta[0] is not a valid relation payload: evidence: Expected array, received string",
        path: "$.relations_delta[0]",
      },
    ]);
  });

  test("non-object output", () => {
    const result = validateStepOutput([1, 2], ctx(research));
    assert.deepEqual(codes(result.errors), ["invalid_section_type"]);
    assert.equal(result.step_id, "AG-30");
  });

  test("generic research output passes with sections and step_meta", () => {
    const result = validateStepOutput(envelope("AG-30"), ctx(research));
    assert.deepEqual(result, { ok: true, step_id: "AG-30", errors: [], warnings: [] });
  });
});

describe("step_meta", () => {
  const research = contract("AG-30", "research");

  test("rejects the placeholder pipeline version", () => {
    const result = validateStepOutput(
      envelope("AG-30", { step_meta: stepMeta("AG-30", { pipeline_version: "n/v" }) }),
      ctx(research)
    );
    assert.deepEqual(codes(result.errors), ["invalid_pipeline_version"]);
  });

  test("accepts git SHAs and SemVer with build metadata", () => {
    for (const version of ["a1b2c3d", "git:0123456789abcdef", "2.1.0-rc.1+build.7"]) {
      const result = validateStepOutput(
        envelope("AG-30", { step_meta: stepMeta("AG-30", { pipeline_version: version }) }),
        ctx(research)
      );
      assert.equal(result.ok, true, version);
    }
  });

  test("reports mismatched step ID, bad timestamps and empty fields together", () => {
    const result = validateStepOutput(
      envelope("AG-30", {
        step_meta: stepMeta("AG-31", { agent_name: " ", finished_at_utc: "2024-06-01 10:00:05" }),
      }),
      ctx(research)
    );
    assert.deepEqual(codes(result.errors), [
      "missing_required_fields",
      "step_id_mismatch",
      "invalid_timestamp",
    ]);
    assert.equal(result.errors[0]?.path, "$.step_meta.agent_name");
    assert.equal(result.errors[2]?.path, "$.step_meta.finished_at_utc");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STEP RULES
// ═══════════════════════════════════════════════════════════════════════════

describe("intake rules", () => {
  const intake = contract("AG-00", "intake", { sections: ["case_normalized", "target_entity_stub"] });

  function intakeOutput(caseNormalized: JsonObject, stub: JsonObject = {}): JsonObject {
    return envelope("AG-00", {
      case_normalized: caseNormalized,
      target_entity_stub: {
        entity_type: "target_company",
        entity_name: caseNormalized["company_name_canonical"],
        domain: caseNormalized["web_domain_normalized"],
        entity_key: caseNormalized["entity_key"],
        ...stub,
      },
    });
  }

  test("accepts a normalized domain and its key", () => {
    const result = validateStepOutput(
      intakeOutput({
        company_name_canonical: "Acme GmbH",
        web_domain_normalized: "www.acme.com",
        entity_key: "domain:www.acme.com",
      }),
      ctx(intake)
    );
    assert.deepEqual(result, { ok: true, step_id: "AG-00", errors: [], warnings: [] });
  });

  test("rejects a key not derived from the domain", () => {
    const result = validateStepOutput(
      intakeOutput(
        {
          company_name_canonical: "Acme GmbH",
          web_domain_normalized: "acme.com",
          entity_key: "name:acme gmbh",
        },
        { entity_key: "domain:acme.com" }
      ),
      ctx(intake)
    );
    assert.deepEqual(codes(result.errors), ["invalid_entity_key"]);
  });

  test("rejects malformed domains", () => {
    const result = validateStepOutput(
      intakeOutput({
        company_name_canonical: "Acme GmbH",
        web_domain_normalized: "acme",
        entity_key: "domain:acme",
      }),
      ctx(intake)
    );
    assert.deepEqual(codes(result.errors), ["invalid_domain_format"]);
  });

  test("warns about a single lowercase name token", () => {
    const result = validateStepOutput(
      intakeOutput({
        company_name_canonical: "acme",
        web_domain_normalized: "acme.com",
        entity_key: "domain:acme.com",
      }),
      ctx(intake)
    );
    assert.equal(result.ok, true);
    assert.deepEqual(codes(result.warnings), ["low_quality_company_name"]);
  });

  test("requires case_normalized fields", () => {
    const result = validateStepOutput(
      intakeOutput({ company_name_canonical: "Acme GmbH", web_domain_normalized: "acme.com" }, { entity_key: "x" }),
      ctx(intake)
    );
    assert.deepEqual(result.errors, [
      {
        code: "missing_required_fields",
        message: "Missing required case_normalized field: entity_key",
        path: "$.case_normalized.entity_key",
      },
    ]);
  });
});

describe("source registry rules", () => {
  const sourceRegistry = contract("AG-01", "source_registry", { sections: ["source_registry"] });

  test("rejects findings that assert facts", () => {
    const result = validateStepOutput(
      envelope("AG-01", {
        source_registry: { primary_sources: [IMPRESSUM], secondary_sources: [] },
        findings: [{ summary: "The company was founded in 2020." }],
      }),
      ctx(sourceRegistry)
    );
    assert.deepEqual(result.errors, [
      {
        code: "factual_claim_in_findings",
        message: "Finding contains a factual claim keyword: founded",
        path: "$.findings[0]",
      },
    ]);
  });

  test("requires well-formed primary sources", () => {
    const empty = validateStepOutput(
      envelope("AG-01", { source_registry: { primary_sources: [] } }),
      ctx(sourceRegistry)
    );
    assert.deepEqual(codes(empty.errors), ["missing_primary_sources"]);

    const malformed = validateStepOutput(
      envelope("AG-01", {
        source_registry: { primary_sources: [{ publisher: "Acme", url: "ftp://acme.com", accessed_at_utc: "x" }] },
      }),
      ctx(sourceRegistry)
    );
    assert.deepEqual(codes(malformed.errors), ["source_missing_required_fields"]);
    assert.equal(malformed.errors[0]?.path, "$.source_registry.primary_sources[0]");
  });

  test("accepts discovery-only findings", () => {
    const result = validateStepOutput(
      envelope("AG-01", {
        source_registry: { primary_sources: [IMPRESSUM], secondary_sources: [] },
        findings: [{ summary: "Candidate sources registered for later steps." }],
      }),
      ctx(sourceRegistry)
    );
    assert.equal(result.ok, true);
  });
});

describe("identity/legal rules", () => {
  const identity = contract("AG-10", "identity_legal");
  const continuity = { web_domain_normalized: "www.acme.com", entity_key: "domain:www.acme.com" };

  function target(fields: JsonObject): JsonObject {
    return {
      entity_id: "TGT-001",
      entity_type: "target_company",
      entity_name: "Acme GmbH",
      domain: "www.acme.com",
      entity_key: "domain:www.acme.com",
      legal_name: "n/v",
      legal_form: "n/v",
      founding_year: "n/v",
      registration_signals: "n/v",
      ...fields,
    };
  }

  test("passes a sourced legal form", () => {
    const result = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [target({ legal_form: "GmbH" })],
        sources: [IMPRESSUM],
        field_sources: { legal_form: [{ url: "https://www.acme.com/impressum" }] },
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.deepEqual(result, { ok: true, step_id: "AG-10", errors: [], warnings: [] });
  });

  test("fails a legal claim without sources", () => {
    const result = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [target({ legal_form: "GmbH" })],
        field_sources: { legal_form: [{ url: "https://www.acme.com/impressum" }] },
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.equal(result.ok, false);
    assert.deepEqual(codes(result.errors), ["missing_sources_for_claims"]);
  });

  test("passes with a warning when every legal field is n/v", () => {
    const result = validateStepOutput(
      envelope("AG-10", { entities_delta: [target({})] }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.equal(result.ok, true);
    assert.deepEqual(codes(result.warnings), ["no_evidence_found"]);
  });

  test("requires field_sources per claimed field", () => {
    const result = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [target({ legal_name: "Acme GmbH", legal_form: "GmbH" })],
        sources: [IMPRESSUM],
        field_sources: { legal_form: [{ url: "https://www.acme.com/impressum" }] },
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.deepEqual(result.errors, [
      {
        code: "missing_field_sources",
        message: "field_sources.legal_name must list http(s) URLs evidencing the value",
        path: "$.field_sources.legal_name",
      },
    ]);
  });

  test("checks founding year bounds and register markers", () => {
    const result = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [target({ founding_year: 1750, registration_signals: "Reg no. 12345" })],
        sources: [IMPRESSUM],
        field_sources: {
          founding_year: [{ url: "https://www.acme.com/history" }],
          registration_signals: [{ url: "https://www.acme.com/impressum" }],
        },
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.deepEqual(codes(result.errors), ["invalid_founding_year", "invalid_registration_signals"]);
    assert.equal(result.errors[0]?.path, "$.entities_delta[0].founding_year");
    assert.equal(result.errors[0]?.message, "founding_year must be an integer in [1800, 2024]");
  });

  test("accepts register evidence and years inside bounds", () => {
    const result = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [
          target({ founding_year: 1998, registration_signals: ["HRB 12345, Amtsgericht Musterstadt"] }),
        ],
        sources: [IMPRESSUM],
        field_sources: {
          founding_year: ["https://www.acme.com/history"],
          registration_signals: [{ url: "https://www.acme.com/impressum" }],
        },
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.equal(result.ok, true);
  });

  test("rejects a future founding year", () => {
    const result = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [target({ founding_year: 2025 })],
        sources: [IMPRESSUM],
        field_sources: { founding_year: [{ url: "https://www.acme.com/history" }] },
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.deepEqual(codes(result.errors), ["invalid_founding_year"]);
  });

  test("requires the target entity, continuity and no relations", () => {
    const missing = validateStepOutput(envelope("AG-10"), ctx(identity));
    assert.deepEqual(codes(missing.errors), ["missing_target_entity"]);

    const drifted = validateStepOutput(
      envelope("AG-10", {
        entities_delta: [target({ domain: "acme.de", entity_key: "domain:acme.de" })],
        relations_delta: [{ source_id: "TGT-001", target_id: "MFR-001", relation_type: "peer_of" }],
      }),
      ctx(identity, { caseNormalized: continuity })
    );
    assert.deepEqual(codes(drifted.errors), ["identity_mismatch", "identity_mismatch", "relations_not_empty"]);
  });

  test("without intake values the key must match the entity's own domain", () => {
    const result = validateStepOutput(
      envelope("AG-10", { entities_delta: [target({ entity_key: "name:acme gmbh" })] }),
      ctx(identity)
    );
    assert.deepEqual(codes(result.errors), ["identity_mismatch"]);
  });
});

describe("locations rules", () => {
  const locations = contract("AG-12", "locations_sites");
  const site = {
    entity_type: "site",
    entity_key: "domain:acme.com#site:plant-north",
    entity_name: "Plant North",
    site_type: "production",
    country_region: "DE",
    city: "Musterstadt",
  };

  test("accepts sites linked from the target with sources", () => {
    const result = validateStepOutput(
      envelope("AG-12", {
        entities_delta: [site],
        relations_delta: [
          { source_id: "TGT-001", relation_type: "operates_at", target_key: site.entity_key },
        ],
        sources: [IMPRESSUM],
      }),
      ctx(locations)
    );
    assert.equal(result.ok, true);
  });

  test("rejects unlinked or mistyped sites and missing sources", () => {
    const result = validateStepOutput(
      envelope("AG-12", { entities_delta: [{ ...site, entity_type: "manufacturer" }] }),
      ctx(locations)
    );
    assert.deepEqual(codes(result.errors), [
      "invalid_site_entity",
      "missing_site_relation",
      "missing_sources_for_claims",
    ]);
  });

  test("a no-evidence finding needs sources or search attempts", () => {
    const finding = { summary: "No evidence of additional sites found." };
    const bare = validateStepOutput(envelope("AG-12", { findings: [finding] }), ctx(locations));
    assert.deepEqual(codes(bare.errors), ["unsubstantiated_negative_finding"]);

    const searched = validateStepOutput(
      envelope("AG-12", {
        findings: [finding],
        search_attempts: [{ query: "acme.com locations", result: "no results" }],
      }),
      ctx(locations)
    );
    assert.equal(searched.ok, true);
  });
});

describe("company size rules", () => {
  const size = contract("AG-11", "company_size");

  function sizedTarget(metrics: JsonObject): JsonObject {
    return {
      entity_id: "TGT-001",
      entity_type: "target_company",
      domain: "acme.com",
      entity_key: "domain:acme.com",
      attributes: { company_size_profile: { quantitative_metrics: metrics } },
    };
  }

  test("accepts sourced numeric signals", () => {
    const result = validateStepOutput(
      envelope("AG-11", {
        entities_delta: [sizedTarget({ annual_revenue_eur: 12000000, number_of_production_sites: "n/v" })],
        sources: [IMPRESSUM],
      }),
      ctx(size)
    );
    assert.equal(result.ok, true);
  });

  test("rejects negative values and unsourced claims", () => {
    const result = validateStepOutput(
      envelope("AG-11", { entities_delta: [sizedTarget({ employee_count: -3 })] }),
      ctx(size)
    );
    assert.deepEqual(result.errors, [
      {
        code: "invalid_size_signal",
        message: "employee_count must be a non-negative number",
        path: "$.entities_delta[0].attributes.company_size_profile.quantitative_metrics.employee_count",
      },
      {
        code: "missing_sources_for_claims",
        message: "Size signals employee_count have values but sources is empty",
        path: "$.sources",
      },
    ]);
  });

  test("warns when every signal is n/v", () => {
    const result = validateStepOutput(
      envelope("AG-11", { entities_delta: [sizedTarget({ annual_revenue_eur: "n/v" })] }),
      ctx(size)
    );
    assert.equal(result.ok, true);
    assert.deepEqual(codes(result.warnings), ["no_evidence_found"]);
  });
});
