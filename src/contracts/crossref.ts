/**
 * Crossref integrity audit over a finished registry.
 *
 * The merger appends relations without checking their endpoints. This
 * audit reports what it let through, so a person or a CI job can decide
 * before results are published.
 */

import { parseEntityId, prefixForType, TARGET_ENTITY_ID, TARGET_ENTITY_TYPE } from "../registry/id-allocator.js";
import type { RegistryDict } from "../registry/schema.js";
import { ErrorCode, type ValidationIssue } from "./issues.js";

export interface CrossrefReport {
  ok: boolean;
  entity_count: number;
  relation_count: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Entities (other than the target) that no relation touches */
  orphaned_entity_ids: string[];
}

function expectedPrefix(entityType: string): string {
  return entityType === TARGET_ENTITY_TYPE ? "TGT" : prefixForType(entityType);
}

export function checkCrossrefIntegrity(registry: RegistryDict): CrossrefReport {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const ids = new Set(registry.entities.map((e) => e.entity_id));
  const touched = new Set<string>();

  registry.relations.forEach((relation, index) => {
    const path = `$.relations[${index}]`;
    for (const end of ["source_id", "target_id"] as const) {
      const id = relation[end];
      if (!ids.has(id)) {
        errors.push({
          code: ErrorCode.DANGLING_REFERENCE,
          message: id === "" ? `${end} is empty` : `${end} ${id} is not a registered entity`,
          path: `${path}.${end}`,
        });
      } else {
        touched.add(id);
      }
    }
    if (relation.source_id !== "" && relation.source_id === relation.target_id) {
      warnings.push({
        code: ErrorCode.SELF_REFERENCE,
        message: `${relation.source_id} relates to itself (${relation.relation_type})`,
        path,
      });
    }
  });

  registry.entities.forEach((entity, index) => {
    const parsed = parseEntityId(entity.entity_id);
    const expected = expectedPrefix(entity.entity_type);
    if (parsed !== null && parsed.prefix !== expected) {
      warnings.push({
        code: ErrorCode.ID_PREFIX_MISMATCH,
        message: `${entity.entity_id} has type ${entity.entity_type}, expected prefix ${expected}`,
        path: `$.entities[${index}].entity_id`,
      });
    }
  });

  const orphaned = registry.entities
    .map((e) => e.entity_id)
    .filter((id) => id !== TARGET_ENTITY_ID && !touched.has(id));

  return {
    ok: errors.length === 0,
    entity_count: registry.entities.length,
    relation_count: registry.relations.length,
    errors,
    warnings,
    orphaned_entity_ids: orphaned,
  };
}

/**
 * Paths of all string values containing non-ASCII characters.
 */
export function findNonAsciiStrings(value: unknown, path = "$"): ValidationIssue[] {
  if (typeof value === "string") {
    return /[^\x00-\x7F]/.test(value)
      ? [{ code: ErrorCode.NON_ASCII_TEXT, message: "Non-ASCII characters detected", path }]
      : [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item: unknown, index) => findNonAsciiStrings(item, `${path}[${index}]`));
  }
  if (typeof value === "object" && value !== null) {
    return Object.entries(value).flatMap(([key, item]) => findNonAsciiStrings(item, `${path}.${key}`));
  }
  return [];
}
