/**
 * Entity / relation data model.
 *
 * Payload schemas describe what agents send in `entities_delta` and
 * `relations_delta`. They pass unknown keys through: agents enrich entities
 * with arbitrary top-level fields, which the merger folds into `attributes`.
 *
 * Field names are snake_case because these objects are persisted and
 * exchanged as JSON artifacts.
 */

import { z } from "zod";

/** Marker for "no verified value" used across payloads. */
export const PLACEHOLDER = "n/v";

/** Entity key of a payload with neither a domain nor a name. */
export const UNRESOLVED_KEY = PLACEHOLDER;

export function isPlaceholder(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" || trimmed.toLowerCase() === PLACEHOLDER;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}

export const CitationSchema = z
  .object({
    publisher: z.string().optional(),
    url: z.string().optional(),
    accessed_at_utc: z.string().optional(),
  })
  .passthrough();

export type Citation = z.infer<typeof CitationSchema>;

export const EntityPayloadSchema = z
  .object({
    entity_id: z.string().optional(),
    entity_type: z.string().optional(),
    entity_name: z.string().optional(),
    domain: z.string().nullable().optional(),
    entity_key: z.string().optional(),
    attributes: z.record(z.unknown()).optional(),
    sources: z.array(CitationSchema).optional(),
  })
  .passthrough();

export type EntityPayload = z.infer<typeof EntityPayloadSchema>;

export const RelationPayloadSchema = z
  .object({
    source_id: z.string().optional(),
    target_id: z.string().optional(),
    /** Endpoint by entity_key, resolved after the entities of the same delta */
    source_key: z.string().optional(),
    target_key: z.string().optional(),
    relation_type: z.string().optional(),
    evidence: z.array(CitationSchema).optional(),
  })
  .passthrough();

export type RelationPayload = z.infer<typeof RelationPayloadSchema>;

/**
 * Registry record for one entity.
 * `entity_id` and `entity_key` never change once the entity exists.
 */
export interface Entity {
  entity_id: string;
  entity_type: string;
  entity_name: string;
  domain: string | null;
  entity_key: string;
  attributes: Record<string, unknown>;
  sources: Citation[];
}

/**
 * Directed edge between two entity IDs. Append-only.
 */
export interface Relation {
  source_id: string;
  target_id: string;
  relation_type: string;
  evidence: Citation[];
}

export const EntitySchema = z
  .object({
    entity_id: z.string().min(1),
    entity_type: z.string(),
    entity_name: z.string(),
    domain: z.string().nullable(),
    entity_key: z.string().min(1),
    attributes: z.record(z.unknown()),
    sources: z.array(CitationSchema),
  })
  .strict();

export const RelationSchema = z
  .object({
    source_id: z.string(),
    target_id: z.string(),
    relation_type: z.string(),
    evidence: z.array(CitationSchema),
  })
  .strict();

/** Terminal form of a registry, as exported and as re-loaded on resume. */
export const RegistryDictSchema = z
  .object({
    entities: z.array(EntitySchema),
    relations: z.array(RelationSchema),
  })
  .strict();

export interface RegistryDict {
  entities: Entity[];
  relations: Relation[];
}
