/**
 * Intake normalization rules.
 */

import type { ContractOf } from "../../config/pipeline/schema.js";
import { isRecord, type JsonObject } from "../../types/json.js";
import { ErrorCode, type IssueCollector } from "../issues.js";
import { isValidDomain } from "../patterns.js";
import type { ValidationContext } from "../stages.js";

function checkRequiredFields(
  section: unknown,
  sectionName: string,
  fields: readonly string[],
  issues: IssueCollector
): JsonObject | null {
  if (!isRecord(section)) {
    issues.error(ErrorCode.INVALID_SECTION_TYPE, `${sectionName} must be an object`, `$.${sectionName}`);
    return null;
  }
  for (const field of fields) {
    const value = section[field];
    if (value === undefined || value === null || value === "") {
      issues.error(
        ErrorCode.MISSING_REQUIRED_FIELDS,
        `Missing required ${sectionName} field: ${field}`,
        `$.${sectionName}.${field}`
      );
    }
  }
  return section;
}

/** A single all-lowercase word, e.g. "acme". */
function looksLikeRawName(name: string): boolean {
  return /^[^\s]+$/.test(name) && /[a-z]/.test(name) && name === name.toLowerCase();
}

export function checkIntake(
  output: JsonObject,
  contract: ContractOf<"intake">,
  _ctx: ValidationContext,
  issues: IssueCollector
): void {
  const caseNormalized = checkRequiredFields(
    output["case_normalized"],
    "case_normalized",
    contract.case_normalized_required_fields,
    issues
  );
  const stub = checkRequiredFields(
    output["target_entity_stub"],
    "target_entity_stub",
    contract.target_entity_stub_required_fields,
    issues
  );
  if (caseNormalized === null || stub === null || issues.hasErrors) {
    return;
  }

  const domain = caseNormalized["web_domain_normalized"];
  if (!isValidDomain(domain)) {
    issues.error(
      ErrorCode.INVALID_DOMAIN_FORMAT,
      `Invalid domain format: ${String(domain)}`,
      "$.case_normalized.web_domain_normalized"
    );
    return;
  }

  const expectedKey = `domain:${domain}`;
  if (caseNormalized["entity_key"] !== expectedKey) {
    issues.error(
      ErrorCode.INVALID_ENTITY_KEY,
      `entity_key must be '${expectedKey}'`,
      "$.case_normalized.entity_key"
    );
  }

  if (stub["entity_type"] !== "target_company") {
    issues.error(
      ErrorCode.IDENTITY_MISMATCH,
      "target_entity_stub.entity_type must be target_company",
      "$.target_entity_stub.entity_type"
    );
  }
  if (stub["entity_key"] !== expectedKey) {
    issues.error(
      ErrorCode.IDENTITY_MISMATCH,
      `target_entity_stub.entity_key must be '${expectedKey}'`,
      "$.target_entity_stub.entity_key"
    );
  }
  if (stub["domain"] !== domain) {
    issues.error(
      ErrorCode.IDENTITY_MISMATCH,
      `target_entity_stub.domain must be '${domain}'`,
      "$.target_entity_stub.domain"
    );
  }

  const name = caseNormalized["company_name_canonical"];
  if (typeof name === "string" && looksLikeRawName(name)) {
    issues.warn(
      ErrorCode.LOW_QUALITY_COMPANY_NAME,
      `Company name '${name}' is a single lowercase token`,
      "$.case_normalized.company_name_canonical"
    );
  }
}
