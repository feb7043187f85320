/**
 * Entity registry: identity keys, deduplication, ID allocation and merge.
 */

export {
  PLACEHOLDER,
  UNRESOLVED_KEY,
  isPlaceholder,
  CitationSchema,
  EntityPayloadSchema,
  RelationPayloadSchema,
  RegistryDictSchema,
  type Citation,
  type Entity,
  type EntityPayload,
  type Relation,
  type RelationPayload,
  type RegistryDict,
} from "./schema.js";

export {
  buildEntityKey,
  normalizeDomain,
  normalizeName,
  normalizeWhitespace,
  isResolvedKey,
} from "./entity-key.js";

export { dedupeEntities, resolveEntityKey } from "./deduper.js";

export {
  IdAllocator,
  ENTITY_ID_PREFIXES,
  FALLBACK_PREFIX,
  TARGET_ENTITY_ID,
  TARGET_ENTITY_TYPE,
  formatEntityId,
  parseEntityId,
  prefixForType,
  type IdSource,
} from "./id-allocator.js";

export { EntityRegistry, RegistryError } from "./entity-registry.js";

export {
  mergeRegistry,
  collectAttributes,
  type MergeInput,
  type MergeReport,
} from "./merger.js";
