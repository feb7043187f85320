/**
 * Identity and legal rules.
 *
 * Every legal field that carries a value needs evidence: a non-empty
 * `sources` list and a `field_sources` entry with URLs for that field.
 * A step that found nothing (all fields placeholder) passes with a warning.
 */

import type { ContractOf } from "../../config/pipeline/schema.js";
import { isPlaceholder } from "../../registry/schema.js";
import { isRecord, type JsonObject } from "../../types/json.js";
import { ErrorCode, joinPath, type IssueCollector } from "../issues.js";
import { REGISTER_MARKERS, findTerm, isHttpUrl } from "../patterns.js";
import {
  checkIdentityContinuity,
  checkSourceList,
  entityField,
  type ValidationContext,
} from "../stages.js";
import { requireTarget } from "./target.js";

function toYear(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\d{4}$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return null;
}

function signalText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === "string" ? item : JSON.stringify(item))).join(" ");
  }
  return JSON.stringify(value);
}

function hasFieldEvidence(entries: unknown): boolean {
  if (!Array.isArray(entries) || entries.length === 0) {
    return false;
  }
  return entries.every((entry: unknown) =>
    typeof entry === "string" ? isHttpUrl(entry) : isRecord(entry) && isHttpUrl(entry["url"])
  );
}

export function checkIdentityLegal(
  output: JsonObject,
  contract: ContractOf<"identity_legal">,
  ctx: ValidationContext,
  issues: IssueCollector
): void {
  const target = requireTarget(output, issues);
  if (target === null) {
    return;
  }

  checkIdentityContinuity(target.entity, target.path, ctx, issues);

  const relations = output["relations_delta"];
  if (Array.isArray(relations) && relations.length > 0) {
    issues.error(
      ErrorCode.RELATIONS_NOT_EMPTY,
      "This step may only update the target entity; relations_delta must be empty",
      "$.relations_delta"
    );
  }

  const foundingYear = entityField(target.entity, "founding_year");
  if (!isPlaceholder(foundingYear)) {
    const year = toYear(foundingYear);
    const currentYear = (ctx.now ?? new Date()).getUTCFullYear();
    if (year === null || year < contract.min_founding_year || year > currentYear) {
      issues.error(
        ErrorCode.INVALID_FOUNDING_YEAR,
        `founding_year must be an integer in [${contract.min_founding_year}, ${currentYear}]`,
        joinPath(target.path, "founding_year")
      );
    }
  }

  const registration = entityField(target.entity, "registration_signals");
  if (!isPlaceholder(registration) && findTerm(signalText(registration), REGISTER_MARKERS) === null) {
    issues.error(
      ErrorCode.INVALID_REGISTRATION_SIGNALS,
      "registration_signals must name a company register authority",
      joinPath(target.path, "registration_signals")
    );
  }

  const claimed = contract.legal_fields.filter(
    (field) => !isPlaceholder(entityField(target.entity, field))
  );

  if (claimed.length === 0) {
    issues.warn(
      ErrorCode.NO_EVIDENCE_FOUND,
      "No verifiable legal identity evidence found; all legal fields are n/v",
      target.path
    );
    return;
  }

  const sources = output["sources"];
  if (!Array.isArray(sources) || sources.length === 0) {
    issues.error(
      ErrorCode.MISSING_SOURCES_FOR_CLAIMS,
      `Legal fields ${claimed.join(", ")} have values but sources is empty`,
      "$.sources"
    );
  } else {
    checkSourceList(sources, "$.sources", issues);
  }

  const fieldSources = output["field_sources"];
  for (const field of claimed) {
    const entries = isRecord(fieldSources) ? fieldSources[field] : undefined;
    if (!hasFieldEvidence(entries)) {
      issues.error(
        ErrorCode.MISSING_FIELD_SOURCES,
        `field_sources.${field} must list http(s) URLs evidencing the value`,
        `$.field_sources.${field}`
      );
    }
  }
}
