/**
 * Delta deduplication by entity key.
 *
 * Pure: no registry access. The first payload for a key wins and input
 * order is kept, so callers put the most trusted payload first.
 */

import { buildEntityKey, isResolvedKey, normalizeDomain, normalizeName } from "./entity-key.js";
import { UNRESOLVED_KEY, type EntityPayload } from "./schema.js";

/**
 * The payload's own entity_key when it carries a real one, otherwise a key
 * built from its domain and name.
 */
export function resolveEntityKey(payload: EntityPayload): string {
  if (isResolvedKey(payload.entity_key)) {
    return payload.entity_key.trim();
  }
  return buildEntityKey(payload.domain, payload.entity_name);
}

/**
 * Key used to detect duplicates within one delta, or null when the payload
 * has no identity at all. Payloads without identity are never collapsed
 * into each other.
 */
function dedupeKey(payload: EntityPayload, entityKey: string): string | null {
  if (entityKey !== UNRESOLVED_KEY) {
    return entityKey;
  }
  const domain = normalizeDomain(payload.domain);
  if (domain) {
    return `domain:${domain}`;
  }
  const name = normalizeName(payload.entity_name);
  if (name) {
    return `name:${name}`;
  }
  return null;
}

/**
 * Drop later payloads that share a key with an earlier one.
 *
 * Returns copies of the surviving payloads with `entity_key` set to the
 * resolved key. Applying it twice gives the same result as applying it once.
 */
export function dedupeEntities(
  payloads: readonly EntityPayload[]
): EntityPayload[] {
  const seen = new Set<string>();
  const survivors: EntityPayload[] = [];

  for (const payload of payloads) {
    const entityKey = resolveEntityKey(payload);
    const key = dedupeKey(payload, entityKey);
    if (key !== null) {
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
    }
    survivors.push({ ...payload, entity_key: entityKey });
  }

  return survivors;
}
