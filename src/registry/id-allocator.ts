/**
 * Typed entity ID allocation (`MFR-006`, `CUS-011`, ...).
 *
 * Counters are seeded once per allocator from the registry it first sees,
 * so a fresh allocator against a resumed registry continues after the
 * highest existing number instead of colliding with it.
 */

export const TARGET_ENTITY_TYPE = "target_company";
export const TARGET_ENTITY_ID = "TGT-001";
export const FALLBACK_PREFIX = "ENT";

export const ENTITY_ID_PREFIXES: ReadonlyMap<string, string> = new Map([
  ["manufacturer", "MFR"],
  ["customer", "CUS"],
  ["site", "LOC"],
  ["location_site", "LOC"],
  ["subsidiary", "SUB"],
]);

const KNOWN_PREFIXES: ReadonlySet<string> = new Set([
  ...ENTITY_ID_PREFIXES.values(),
  FALLBACK_PREFIX,
]);

const ENTITY_ID_PATTERN = /^([A-Z]{3})-(\d+)$/;

/**
 * What the allocator needs to know about a registry.
 */
export interface IdSource {
  entityIds(): Iterable<string>;
  hasId(entityId: string): boolean;
}

export function prefixForType(entityType: string): string {
  return ENTITY_ID_PREFIXES.get(entityType) ?? FALLBACK_PREFIX;
}

export function formatEntityId(prefix: string, counter: number): string {
  return `${prefix}-${String(counter).padStart(3, "0")}`;
}

/**
 * Split an ID into prefix and number, or null if it is not a typed ID.
 */
export function parseEntityId(
  entityId: string
): { prefix: string; counter: number } | null {
  const match = ENTITY_ID_PATTERN.exec(entityId);
  if (match === null || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { prefix: match[1], counter: parseInt(match[2], 10) };
}

export class IdAllocator {
  private readonly counters = new Map<string, number>();
  private seeded = false;

  /**
   * Next free ID for an entity type. `target_company` is always TGT-001.
   */
  allocate(entityType: string, registry: IdSource): string {
    if (entityType === TARGET_ENTITY_TYPE) {
      return TARGET_ENTITY_ID;
    }

    this.seedFrom(registry);

    const prefix = prefixForType(entityType);
    let counter = (this.counters.get(prefix) ?? 0) + 1;
    let entityId = formatEntityId(prefix, counter);
    while (registry.hasId(entityId)) {
      counter += 1;
      entityId = formatEntityId(prefix, counter);
    }

    this.counters.set(prefix, counter);
    return entityId;
  }

  /** Current counter for a prefix (0 before any allocation or seeding). */
  peek(prefix: string): number {
    return this.counters.get(prefix) ?? 0;
  }

  private seedFrom(registry: IdSource): void {
    if (this.seeded) {
      return;
    }
    for (const entityId of registry.entityIds()) {
      const parsed = parseEntityId(entityId);
      if (parsed === null || !KNOWN_PREFIXES.has(parsed.prefix)) {
        continue;
      }
      const current = this.counters.get(parsed.prefix) ?? 0;
      if (parsed.counter > current) {
        this.counters.set(parsed.prefix, parsed.counter);
      }
    }
    this.seeded = true;
  }
}
