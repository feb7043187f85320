/**
 * Step states and step output shapes.
 *
 * Every agent returns the same envelope. Steps with their own rules add
 * sections on top of it; the many plain research steps use the envelope
 * as is.
 */

import { z } from "zod";
import type { Citation, EntityPayload, RelationPayload } from "../registry/schema.js";

export enum StepStatus {
  Pending = "pending",
  Running = "running",
  ValidatedOk = "validated_ok",
  ValidatedFailed = "validated_failed",
  AgentFailed = "agent_failed",
  Skipped = "skipped",
}

export interface StepMeta {
  step_id: string;
  agent_name: string;
  run_id: string;
  started_at_utc: string;
  finished_at_utc: string;
  pipeline_version: string;
}

export interface Finding {
  summary: string;
  notes?: unknown;
  [key: string]: unknown;
}

export interface StepOutputEnvelope {
  step_meta: StepMeta;
  entities_delta: EntityPayload[];
  relations_delta: RelationPayload[];
  findings: Finding[];
  sources: Citation[];
}

/**
 * Published by the intake step and handed to the steps that consume it.
 */
export const CaseNormalizedSchema = z
  .object({
    company_name_canonical: z.string(),
    web_domain_normalized: z.string(),
    entity_key: z.string(),
    domain_valid: z.boolean(),
  })
  .passthrough();

export type CaseNormalized = z.infer<typeof CaseNormalizedSchema>;

export const TargetEntityStubSchema = z
  .object({
    entity_type: z.literal("target_company"),
    entity_name: z.string(),
    domain: z.string(),
    entity_key: z.string(),
  })
  .passthrough();

export type TargetEntityStub = z.infer<typeof TargetEntityStubSchema>;

export interface MetaPayloads {
  case_normalized?: CaseNormalized;
  target_entity_stub?: TargetEntityStub;
}

export interface IntakeOutput extends StepOutputEnvelope {
  case_normalized: CaseNormalized;
  target_entity_stub: TargetEntityStub;
}

export interface SourceRegistryOutput extends StepOutputEnvelope {
  source_registry: {
    primary_sources: Citation[];
    secondary_sources: Citation[];
  };
}

export interface IdentityLegalOutput extends StepOutputEnvelope {
  /** Legal field name → URLs evidencing it */
  field_sources: Record<string, Array<{ url: string }>>;
}

export interface LocationsOutput extends StepOutputEnvelope {
  search_attempts: Array<{ query: string; result: string }>;
}

export interface CompanySizeOutput extends StepOutputEnvelope {
  company_size_profile: Record<string, unknown>;
}

export type StepOutput =
  | IntakeOutput
  | SourceRegistryOutput
  | IdentityLegalOutput
  | LocationsOutput
  | CompanySizeOutput
  | StepOutputEnvelope;
