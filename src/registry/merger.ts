/**
 * Registry merger: the only place where a run's registry is written.
 *
 * Order within one merge call:
 *   1. dedupe the entity delta
 *   2. create or update each surviving entity
 *   3. append every relation
 *
 * Entities are matched by `entity_key` only; an explicit `entity_id` names
 * a new entity and never redirects a payload onto another key's entity.
 * Entities go first so that relations may refer, by key, to entities
 * created in the same delta. Relation endpoints are not checked here;
 * crossref integrity is a separate audit (contracts/crossref.ts).
 */

import { dedupeEntities } from "./deduper.js";
import { normalizeDomain } from "./entity-key.js";
import { EntityRegistry } from "./entity-registry.js";
import { IdAllocator, TARGET_ENTITY_ID, TARGET_ENTITY_TYPE } from "./id-allocator.js";
import {
  UNRESOLVED_KEY,
  type Citation,
  type Entity,
  type EntityPayload,
  type RelationPayload,
} from "./schema.js";

/** Payload keys that describe identity rather than enrichment. */
const IDENTITY_FIELDS: ReadonlySet<string> = new Set([
  "entity_id",
  "entity_type",
  "entity_name",
  "domain",
  "entity_key",
  "attributes",
  "sources",
]);

export interface MergeInput {
  registry: EntityRegistry;
  entitiesDelta: readonly EntityPayload[];
  relationsDelta: readonly RelationPayload[];
  /** Reuse one allocator across steps; a fresh one seeds from the registry */
  allocator?: IdAllocator;
}

export interface MergeReport {
  newEntities: number;
  updatedEntities: number;
  newRelations: number;
  /** IDs of the entities created by this merge, in creation order */
  createdIds: string[];
}

/**
 * Enrichment carried by a payload: unknown top-level fields plus its
 * `attributes` map, the latter winning on conflict.
 */
export function collectAttributes(payload: EntityPayload): Record<string, unknown> {
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!IDENTITY_FIELDS.has(key)) {
      extras[key] = value;
    }
  }
  return { ...extras, ...(payload.attributes ?? {}) };
}

function findExisting(
  registry: EntityRegistry,
  payload: EntityPayload,
  entityKey: string
): string | undefined {
  if (entityKey !== UNRESOLVED_KEY) {
    const byKey = registry.idForKey(entityKey);
    if (byKey !== undefined) {
      return byKey;
    }
  }
  // One target company per run: a second target payload updates TGT-001.
  if (payload.entity_type === TARGET_ENTITY_TYPE && registry.hasId(TARGET_ENTITY_ID)) {
    return TARGET_ENTITY_ID;
  }
  return undefined;
}

/**
 * ID for a new entity: the payload's own `entity_id` when it is still free,
 * otherwise the next allocated ID for its type.
 */
function newEntityId(registry: EntityRegistry, payload: EntityPayload, allocator: IdAllocator): string {
  if (payload.entity_id && !registry.hasId(payload.entity_id)) {
    return payload.entity_id;
  }
  return allocator.allocate(payload.entity_type ?? "", registry);
}

function buildEntity(payload: EntityPayload, entityId: string, entityKey: string): Entity {
  const domain = normalizeDomain(payload.domain);
  return {
    entity_id: entityId,
    entity_type: payload.entity_type ?? "",
    entity_name: payload.entity_name ?? "",
    domain: domain === "" ? null : domain,
    // Keyless entities get a unique key so they never absorb each other.
    entity_key: entityKey === UNRESOLVED_KEY ? `unresolved:${entityId}` : entityKey,
    attributes: collectAttributes(payload),
    sources: [...(payload.sources ?? [])],
  };
}

function resolveEndpoint(
  registry: EntityRegistry,
  entityId: string | undefined,
  entityKey: string | undefined
): string {
  if (entityId) {
    return entityId;
  }
  if (entityKey) {
    return registry.idForKey(entityKey) ?? "";
  }
  return "";
}

/**
 * Fold one step's delta into the registry and report what changed.
 */
export function mergeRegistry(input: MergeInput): MergeReport {
  const { registry, entitiesDelta, relationsDelta } = input;
  const allocator = input.allocator ?? new IdAllocator();
  const report: MergeReport = {
    newEntities: 0,
    updatedEntities: 0,
    newRelations: 0,
    createdIds: [],
  };

  for (const payload of dedupeEntities(entitiesDelta)) {
    const entityKey = payload.entity_key ?? UNRESOLVED_KEY;
    const existingId = findExisting(registry, payload, entityKey);

    if (existingId === undefined) {
      const entityId = newEntityId(registry, payload, allocator);
      registry.addEntity(buildEntity(payload, entityId, entityKey));
      report.newEntities += 1;
      report.createdIds.push(entityId);
    } else {
      const sources: Citation[] = payload.sources ?? [];
      registry.updateEntity(existingId, collectAttributes(payload), sources);
      report.updatedEntities += 1;
    }
  }

  for (const payload of relationsDelta) {
    registry.addRelation({
      source_id: resolveEndpoint(registry, payload.source_id, payload.source_key),
      target_id: resolveEndpoint(registry, payload.target_id, payload.target_key),
      relation_type: payload.relation_type ?? "",
      evidence: [...(payload.evidence ?? [])],
    });
    report.newRelations += 1;
  }

  return report;
}
