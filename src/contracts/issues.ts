/**
 * Validation issue model shared by the gatekeeper and the crossref audit.
 *
 * Validators never throw on bad payloads. They return issues, and the
 * caller decides whether errors stop the run.
 */

export const ErrorCode = {
  MISSING_REQUIRED_SECTIONS: "missing_required_sections",
  INVALID_SECTION_TYPE: "invalid_section_type",
  MISSING_REQUIRED_FIELDS: "missing_required_fields",
  STEP_ID_MISMATCH: "step_id_mismatch",
  INVALID_TIMESTAMP: "invalid_timestamp",
  INVALID_PIPELINE_VERSION: "invalid_pipeline_version",
  INVALID_DOMAIN_FORMAT: "invalid_domain_format",
  INVALID_ENTITY_KEY: "invalid_entity_key",
  LOW_QUALITY_COMPANY_NAME: "low_quality_company_name",
  MISSING_PRIMARY_SOURCES: "missing_primary_sources",
  SOURCE_MISSING_REQUIRED_FIELDS: "source_missing_required_fields",
  FACTUAL_CLAIM_IN_FINDINGS: "factual_claim_in_findings",
  MISSING_TARGET_ENTITY: "missing_target_entity",
  IDENTITY_MISMATCH: "identity_mismatch",
  RELATIONS_NOT_EMPTY: "relations_not_empty",
  INVALID_FOUNDING_YEAR: "invalid_founding_year",
  INVALID_REGISTRATION_SIGNALS: "invalid_registration_signals",
  MISSING_SOURCES_FOR_CLAIMS: "missing_sources_for_claims",
  MISSING_FIELD_SOURCES: "missing_field_sources",
  NO_EVIDENCE_FOUND: "no_evidence_found",
  INVALID_SITE_ENTITY: "invalid_site_entity",
  MISSING_SITE_RELATION: "missing_site_relation",
  UNSUBSTANTIATED_NEGATIVE_FINDING: "unsubstantiated_negative_finding",
  INVALID_SIZE_SIGNAL: "invalid_size_signal",
  DANGLING_REFERENCE: "dangling_reference",
  SELF_REFERENCE: "self_reference",
  ID_PREFIX_MISMATCH: "id_prefix_mismatch",
  NON_ASCII_TEXT: "non_ascii_text",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ValidationIssue {
  code: ErrorCode;
  message: string;
  /** Locator into the payload, e.g. `$.entities_delta[0].founding_year` */
  path: string;
}

/**
 * Gatekeeper verdict for one step, persisted as validator.json.
 */
export interface ValidatorResult {
  ok: boolean;
  step_id: string;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Collects issues while a stage runs.
 */
export class IssueCollector {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];

  error(code: ErrorCode, message: string, path: string): void {
    this.errors.push({ code, message, path });
  }

  warn(code: ErrorCode, message: string, path: string): void {
    this.warnings.push({ code, message, path });
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }
}

export function formatIssue(issue: ValidationIssue): string {
  return `[${issue.code}] ${issue.path}: ${issue.message}`;
}

export function joinPath(base: string, key: string | number): string {
  return typeof key === "number" ? `${base}[${key}]` : `${base}.${key}`;
}
