/**
 * Pipeline configuration schemas.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DECLARATIVE RUN PLAN
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Two files describe a run, and both are loaded once before any step
 * executes:
 *
 * 1. DAG (`configs/pipeline/dag.json`): the ordered list of steps, the
 *    dependencies each step waits on, the meta payloads it consumes and
 *    optional fan-in barriers that a step may depend on as a whole.
 *
 * 2. STEP CONTRACTS (`configs/pipeline/step-contracts.json`): per step,
 *    the sections its output must carry and the rule set (`kind`) the
 *    gatekeeper applies to it. Rule parameters (field lists, year bounds)
 *    live here so they can change without touching the validator.
 *
 * A step missing from either file is a configuration error; the run does
 * not start.
 */

import { z } from "zod";

/**
 * Step identifier, e.g. "AG-00", "AG-10".
 */
export const StepIdSchema = z
  .string()
  .regex(/^AG-\d{2}$/, "Step IDs look like AG-00")
  .describe("Pipeline step identifier");

/**
 * Payloads the intake step publishes for later steps.
 */
export const MetaKey = z.enum(["case_normalized", "target_entity_stub"]);
export type MetaKey = z.infer<typeof MetaKey>;

export const DagStepSchema = z
  .object({
    step_id: StepIdSchema,
    /** Step IDs or barrier names that must complete first */
    depends_on: z.array(z.string().min(1)).default([]),
    /** Meta payloads handed to the agent */
    consumes: z.array(MetaKey).default([]),
  })
  .strict();

export type DagStep = z.infer<typeof DagStepSchema>;

export const BarrierSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(/^[a-z][a-z0-9_]*$/, "Barrier names are lower_snake_case"),
    steps: z.array(StepIdSchema).min(1),
  })
  .strict();

export type Barrier = z.infer<typeof BarrierSchema>;

export const DagSchema = z
  .object({
    version: z.string().min(1).optional(),
    steps: z.array(DagStepSchema).min(1, "DAG must declare at least one step"),
    barriers: z.array(BarrierSchema).default([]),
  })
  .strict();

export type Dag = z.infer<typeof DagSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// STEP CONTRACTS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_STEP_META_FIELDS = [
  "step_id",
  "agent_name",
  "run_id",
  "started_at_utc",
  "finished_at_utc",
  "pipeline_version",
] as const;

const ContractBaseSchema = z.object({
  step_id: StepIdSchema,
  description: z.string().optional(),
  required_sections: z
    .array(z.string().min(1))
    .min(1)
    .describe("Top-level keys the output must contain"),
  step_meta_required_fields: z
    .array(z.string().min(1))
    .default([...DEFAULT_STEP_META_FIELDS]),
});

export const IntakeContractSchema = ContractBaseSchema.extend({
  kind: z.literal("intake"),
  case_normalized_required_fields: z
    .array(z.string())
    .default(["company_name_canonical", "web_domain_normalized", "entity_key"]),
  target_entity_stub_required_fields: z
    .array(z.string())
    .default(["entity_type", "entity_name", "domain", "entity_key"]),
}).strict();

export const SourceRegistryContractSchema = ContractBaseSchema.extend({
  kind: z.literal("source_registry"),
  /** Words that mark a finding as a factual claim */
  claim_keywords: z.array(z.string().min(1)).optional(),
}).strict();

export const IdentityLegalContractSchema = ContractBaseSchema.extend({
  kind: z.literal("identity_legal"),
  legal_fields: z
    .array(z.string())
    .default(["legal_name", "legal_form", "founding_year", "registration_signals"]),
  min_founding_year: z.number().int().default(1800),
}).strict();

export const LocationsContractSchema = ContractBaseSchema.extend({
  kind: z.literal("locations_sites"),
  site_required_fields: z
    .array(z.string())
    .default([
      "entity_type",
      "entity_key",
      "entity_name",
      "site_type",
      "country_region",
      "city",
    ]),
  relation_type: z.string().default("operates_at"),
}).strict();

export const CompanySizeContractSchema = ContractBaseSchema.extend({
  kind: z.literal("company_size"),
  /** Size signals read from the target entity's company_size_profile */
  size_fields: z
    .array(z.string())
    .default([
      "annual_revenue_eur",
      "employee_count",
      "number_of_production_sites",
      "mro_inventory_value_eur",
      "ppe_value_eur",
    ]),
}).strict();

export const ResearchContractSchema = ContractBaseSchema.extend({
  kind: z.literal("research"),
}).strict();

export const StepContractSchema = z.discriminatedUnion("kind", [
  IntakeContractSchema,
  SourceRegistryContractSchema,
  IdentityLegalContractSchema,
  LocationsContractSchema,
  CompanySizeContractSchema,
  ResearchContractSchema,
]);

export type StepContract = z.infer<typeof StepContractSchema>;
export type ContractKind = StepContract["kind"];
export type ContractOf<K extends ContractKind> = Extract<StepContract, { kind: K }>;

export const StepContractsSchema = z
  .object({
    version: z.string().min(1).optional(),
    steps: z.array(StepContractSchema).min(1),
  })
  .strict();

export type StepContracts = z.infer<typeof StepContractsSchema>;
