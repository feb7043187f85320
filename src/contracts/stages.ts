/**
 * Validation stages shared by every step contract.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGED VALIDATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The gatekeeper runs stages in order and stops after the first stage that
 * reports an error. Later stages may therefore assume what earlier ones
 * checked: the step rules never see a payload without its sections or
 * with a malformed step_meta.
 *
 *   1. sections     required top-level keys present
 *   2. shapes       envelope sections have the right JSON type, and every
 *                   delta element parses as an entity or relation payload
 *   3. step_meta    identity, timestamps, pipeline version
 *   4. step rules   per contract kind (rules/*.ts)
 */

import type { ZodError, ZodTypeAny } from "zod";

import type { StepContract } from "../config/pipeline/schema.js";
import { EntityPayloadSchema, PLACEHOLDER, RelationPayloadSchema } from "../registry/schema.js";
import { isRecord, type JsonObject } from "../types/json.js";
import { ErrorCode, IssueCollector, joinPath } from "./issues.js";
import { isHttpUrl, isIsoUtc, isPipelineVersion } from "./patterns.js";

/**
 * Values carried forward from the intake step for continuity checks.
 */
export interface IdentityReference {
  web_domain_normalized?: string;
  entity_key?: string;
}

export interface ValidationContext {
  stepId: string;
  contract: StepContract;
  caseNormalized?: IdentityReference;
  /** Clock for year bounds; defaults to the current time */
  now?: Date;
}

export type Stage = (
  output: JsonObject,
  ctx: ValidationContext,
  issues: IssueCollector
) => void;

const ARRAY_SECTIONS = ["entities_delta", "relations_delta", "findings", "sources"] as const;

const DELTA_ELEMENTS: ReadonlyArray<[section: string, label: string, schema: ZodTypeAny]> = [
  ["entities_delta", "entity", EntityPayloadSchema],
  ["relations_delta", "relation", RelationPayloadSchema],
];

export const checkSections: Stage = (output, ctx, issues) => {
  for (const section of ctx.contract.required_sections) {
    if (!(section in output)) {
      issues.error(
        ErrorCode.MISSING_REQUIRED_SECTIONS,
        `Missing required section: ${section}`,
        `$.${section}`
      );
    }
  }
};

function describeZodError(error: ZodError): string {
  const first = error.issues[0];
  if (first === undefined) {
    return "invalid";
  }
  return first.path.length > 0 ? `${first.path.join(".")}: ${first.message}` : first.message;
}

export const checkShapes: Stage = (output, _ctx, issues) => {
  if ("step_meta" in output && !isRecord(output["step_meta"])) {
    issues.error(ErrorCode.INVALID_SECTION_TYPE, "step_meta must be an object", "$.step_meta");
  }
  for (const section of ARRAY_SECTIONS) {
    if (section in output && !Array.isArray(output[section])) {
      issues.error(ErrorCode.INVALID_SECTION_TYPE, `${section} must be a list`, `$.${section}`);
    }
  }

  for (const [section, label, schema] of DELTA_ELEMENTS) {
    const elements = output[section];
    if (!Array.isArray(elements)) {
      continue;
    }
    elements.forEach((element: unknown, index) => {
      const result = schema.safeParse(element);
      if (result.success) {
        return;
      }
      issues.error(
        ErrorCode.INVALID_SECTION_TYPE,
        `${section}[${index}] is not a valid ${label} payload: ${describeZodError(result.error)}`,
        joinPath(`$.${section}`, index)
      );
    });
  }
};

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

export const checkStepMeta: Stage = (output, ctx, issues) => {
  const meta = output["step_meta"];
  if (!isRecord(meta)) {
    // Contracts without a step_meta section skip this stage.
    return;
  }

  for (const field of ctx.contract.step_meta_required_fields) {
    if (isBlank(meta[field])) {
      issues.error(
        ErrorCode.MISSING_REQUIRED_FIELDS,
        `step_meta.${field} is missing or empty`,
        `$.step_meta.${field}`
      );
    }
  }

  const stepId = meta["step_id"];
  if (!isBlank(stepId) && stepId !== ctx.stepId) {
    issues.error(
      ErrorCode.STEP_ID_MISMATCH,
      `step_meta.step_id is ${String(stepId)}, expected ${ctx.stepId}`,
      "$.step_meta.step_id"
    );
  }

  for (const field of ["started_at_utc", "finished_at_utc"]) {
    const value = meta[field];
    if (!isBlank(value) && !isIsoUtc(value)) {
      issues.error(
        ErrorCode.INVALID_TIMESTAMP,
        `step_meta.${field} must match YYYY-MM-DDTHH:MM:SSZ`,
        `$.step_meta.${field}`
      );
    }
  }

  const version = meta["pipeline_version"];
  if (!isBlank(version) && (version === PLACEHOLDER || !isPipelineVersion(version))) {
    issues.error(
      ErrorCode.INVALID_PIPELINE_VERSION,
      "step_meta.pipeline_version must be a git SHA or a SemVer version",
      "$.step_meta.pipeline_version"
    );
  }
};

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS FOR STEP RULES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Report every source that lacks a publisher, an http(s) URL or an access
 * timestamp. Returns true when the list is well formed.
 */
export function checkSourceList(
  sources: unknown,
  path: string,
  issues: IssueCollector
): boolean {
  if (!Array.isArray(sources)) {
    issues.error(ErrorCode.SOURCE_MISSING_REQUIRED_FIELDS, "sources must be a list", path);
    return false;
  }
  let ok = true;
  sources.forEach((entry: unknown, index) => {
    const entryPath = joinPath(path, index);
    if (
      !isRecord(entry) ||
      isBlank(entry["publisher"]) ||
      !isHttpUrl(entry["url"]) ||
      isBlank(entry["accessed_at_utc"])
    ) {
      issues.error(
        ErrorCode.SOURCE_MISSING_REQUIRED_FIELDS,
        "source requires publisher, http(s) url, accessed_at_utc",
        entryPath
      );
      ok = false;
    }
  });
  return ok;
}

/** Entities in the delta, paired with their index. */
export function deltaEntities(output: JsonObject): Array<{ entity: JsonObject; index: number }> {
  const delta = output["entities_delta"];
  if (!Array.isArray(delta)) {
    return [];
  }
  const result: Array<{ entity: JsonObject; index: number }> = [];
  delta.forEach((entity: unknown, index) => {
    if (isRecord(entity)) {
      result.push({ entity, index });
    }
  });
  return result;
}

/**
 * Read a field from an entity payload, looking at the top level first and
 * then inside `attributes`.
 */
export function entityField(entity: JsonObject, field: string): unknown {
  if (field in entity) {
    return entity[field];
  }
  const attributes = entity["attributes"];
  return isRecord(attributes) ? attributes[field] : undefined;
}

/** Concatenated text of one finding (string or object with text fields). */
export function findingText(finding: unknown): string {
  if (typeof finding === "string") {
    return finding;
  }
  if (!isRecord(finding)) {
    return "";
  }
  const parts: string[] = [];
  for (const value of Object.values(finding)) {
    if (typeof value === "string") {
      parts.push(value);
    } else if (isRecord(value) || Array.isArray(value)) {
      parts.push(JSON.stringify(value));
    }
  }
  return parts.join(" ");
}

/**
 * Identity continuity: the target entity's key and domain must equal what
 * the intake step published. Without intake values, the key must at least
 * be derived from the entity's own domain.
 */
export function checkIdentityContinuity(
  target: JsonObject,
  targetPath: string,
  ctx: ValidationContext,
  issues: IssueCollector
): void {
  const entityKey = target["entity_key"];
  const domain = target["domain"];
  const expectedKey = ctx.caseNormalized?.entity_key;
  const expectedDomain = ctx.caseNormalized?.web_domain_normalized;

  if (expectedKey !== undefined || expectedDomain !== undefined) {
    if (expectedKey !== undefined && entityKey !== expectedKey) {
      issues.error(
        ErrorCode.IDENTITY_MISMATCH,
        `entity_key must equal intake value ${expectedKey}`,
        joinPath(targetPath, "entity_key")
      );
    }
    if (expectedDomain !== undefined && domain !== expectedDomain) {
      issues.error(
        ErrorCode.IDENTITY_MISMATCH,
        `domain must equal intake value ${expectedDomain}`,
        joinPath(targetPath, "domain")
      );
    }
    return;
  }

  if (typeof domain !== "string" || entityKey !== `domain:${domain}`) {
    issues.error(
      ErrorCode.IDENTITY_MISMATCH,
      "entity_key must be domain:<domain> of the target entity",
      joinPath(targetPath, "entity_key")
    );
  }
}
