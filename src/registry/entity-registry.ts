/**
 * Entity registry for one pipeline run.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * AGGREGATE ROOT OF THE INTELLIGENCE GRAPH
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Holds every entity and relation merged so far:
 *
 * 1. entitiesById: entity_id → Entity (owns the records)
 * 2. entitiesByKey: entity_key → entity_id (identity lookup)
 * 3. relations: append-only, in merge order
 *
 * Both indexes always agree: one entity per key, one entity per ID. The
 * registry is mutated only through the merger (see merger.ts). Readers get
 * deep copies, so a snapshot handed to an agent or an exporter cannot
 * reach back into the live registry.
 *
 * Lifecycle: created empty at run start (or rebuilt from an exported
 * snapshot with fromDict), grown step by step, and read-only once the last
 * step is merged.
 */

import {
  RegistryDictSchema,
  type Citation,
  type Entity,
  type Relation,
  type RegistryDict,
} from "./schema.js";
import type { IdSource } from "./id-allocator.js";

/**
 * Misuse of the registry API (duplicate IDs or keys, unknown entity).
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class EntityRegistry implements IdSource {
  private readonly entitiesById = new Map<string, Entity>();
  private readonly entitiesByKey = new Map<string, string>();
  private readonly relationLog: Relation[] = [];

  private constructor() {}

  static create(): EntityRegistry {
    return new EntityRegistry();
  }

  /**
   * Rebuild a registry from its exported dict form.
   *
   * @throws RegistryError if the snapshot is malformed or repeats an ID or key
   */
  static fromDict(input: unknown): EntityRegistry {
    const parsed = RegistryDictSchema.safeParse(input);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? first.path.join(".") || "(root)" : "(root)";
      throw new RegistryError(
        `Invalid registry snapshot at ${where}: ${first?.message ?? "unknown error"}`
      );
    }

    const registry = new EntityRegistry();
    for (const entity of parsed.data.entities) {
      registry.addEntity(entity);
    }
    for (const relation of parsed.data.relations) {
      registry.addRelation(relation);
    }
    return registry;
  }

  get entityCount(): number {
    return this.entitiesById.size;
  }

  get relationCount(): number {
    return this.relationLog.length;
  }

  hasId(entityId: string): boolean {
    return this.entitiesById.has(entityId);
  }

  hasKey(entityKey: string): boolean {
    return this.entitiesByKey.has(entityKey);
  }

  entityIds(): IterableIterator<string> {
    return this.entitiesById.keys();
  }

  idForKey(entityKey: string): string | undefined {
    return this.entitiesByKey.get(entityKey);
  }

  getById(entityId: string): Entity | undefined {
    const entity = this.entitiesById.get(entityId);
    return entity ? structuredClone(entity) : undefined;
  }

  getByKey(entityKey: string): Entity | undefined {
    const entityId = this.entitiesByKey.get(entityKey);
    return entityId === undefined ? undefined : this.getById(entityId);
  }

  /**
   * Insert a new entity into both indexes.
   *
   * @throws RegistryError if the ID or the key is already taken
   */
  addEntity(entity: Entity): void {
    if (this.entitiesById.has(entity.entity_id)) {
      throw new RegistryError(`Entity ID already registered: ${entity.entity_id}`);
    }
    if (this.entitiesByKey.has(entity.entity_key)) {
      throw new RegistryError(`Entity key already registered: ${entity.entity_key}`);
    }
    const stored = structuredClone(entity);
    this.entitiesById.set(stored.entity_id, stored);
    this.entitiesByKey.set(stored.entity_key, stored.entity_id);
  }

  /**
   * Shallow-merge attributes (incoming keys win, others are kept) and
   * append sources. Identity fields never change.
   *
   * @throws RegistryError if the entity does not exist
   */
  updateEntity(
    entityId: string,
    attributes: Record<string, unknown>,
    sources: readonly Citation[]
  ): void {
    const entity = this.entitiesById.get(entityId);
    if (entity === undefined) {
      throw new RegistryError(`Unknown entity ID: ${entityId}`);
    }
    entity.attributes = { ...entity.attributes, ...structuredClone(attributes) };
    entity.sources.push(...structuredClone([...sources]));
  }

  addRelation(relation: Relation): void {
    this.relationLog.push(structuredClone(relation));
  }

  relations(): Relation[] {
    return structuredClone(this.relationLog);
  }

  /** All entities, sorted by entity_id. */
  entities(): Entity[] {
    return [...this.entitiesById.values()]
      .sort((a, b) => compareIds(a.entity_id, b.entity_id))
      .map((entity) => structuredClone(entity));
  }

  /**
   * Terminal dict form: entities sorted by ID, relations in merge order.
   */
  toDict(): RegistryDict {
    return { entities: this.entities(), relations: this.relations() };
  }
}
