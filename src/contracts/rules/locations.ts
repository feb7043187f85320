/**
 * Locations and sites rules.
 */

import type { ContractOf } from "../../config/pipeline/schema.js";
import { TARGET_ENTITY_ID } from "../../registry/id-allocator.js";
import { isRecord, type JsonObject } from "../../types/json.js";
import { ErrorCode, joinPath, type IssueCollector } from "../issues.js";
import { NO_EVIDENCE_PHRASES, findTerm } from "../patterns.js";
import {
  checkSourceList,
  deltaEntities,
  findingText,
  type ValidationContext,
} from "../stages.js";

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function pointsAt(relation: JsonObject, site: JsonObject): boolean {
  const siteId = site["entity_id"];
  const siteKey = site["entity_key"];
  return (
    (!isMissing(siteId) && relation["target_id"] === siteId) ||
    (!isMissing(siteKey) && relation["target_key"] === siteKey)
  );
}

export function checkLocations(
  output: JsonObject,
  contract: ContractOf<"locations_sites">,
  _ctx: ValidationContext,
  issues: IssueCollector
): void {
  const sites = deltaEntities(output);
  const rawRelations = output["relations_delta"];
  const relations = (Array.isArray(rawRelations) ? rawRelations : []).filter(isRecord);

  for (const { entity, index } of sites) {
    const path = `$.entities_delta[${index}]`;
    if (entity["entity_type"] !== "site") {
      issues.error(
        ErrorCode.INVALID_SITE_ENTITY,
        `entity_type must be site, got ${String(entity["entity_type"])}`,
        joinPath(path, "entity_type")
      );
    }
    for (const field of contract.site_required_fields) {
      if (isMissing(entity[field])) {
        issues.error(
          ErrorCode.MISSING_REQUIRED_FIELDS,
          `Site is missing required field: ${field}`,
          joinPath(path, field)
        );
      }
    }

    const linked = relations.some(
      (relation) =>
        relation["relation_type"] === contract.relation_type &&
        relation["source_id"] === TARGET_ENTITY_ID &&
        pointsAt(relation, entity)
    );
    if (!linked) {
      issues.error(
        ErrorCode.MISSING_SITE_RELATION,
        `Site needs a ${contract.relation_type} relation from ${TARGET_ENTITY_ID}`,
        path
      );
    }
  }

  const sources = output["sources"];
  const hasSources = Array.isArray(sources) && sources.length > 0;

  if (sites.length > 0) {
    if (!hasSources) {
      issues.error(
        ErrorCode.MISSING_SOURCES_FOR_CLAIMS,
        `${sites.length} site(s) reported but sources is empty`,
        "$.sources"
      );
    } else {
      checkSourceList(sources, "$.sources", issues);
    }
  }

  const attempts = output["search_attempts"];
  const hasAttempts = Array.isArray(attempts) && attempts.length > 0;
  const findings = output["findings"];
  if (Array.isArray(findings)) {
    findings.forEach((finding: unknown, index) => {
      if (findTerm(findingText(finding), NO_EVIDENCE_PHRASES) !== null && !hasSources && !hasAttempts) {
        issues.error(
          ErrorCode.UNSUBSTANTIATED_NEGATIVE_FINDING,
          "A no-evidence finding needs sources or search_attempts",
          `$.findings[${index}]`
        );
      }
    });
  }
}
