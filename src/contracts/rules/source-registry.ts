/**
 * Source registry rules. This step discovers sources; it must not assert
 * facts about the company.
 */

import type { ContractOf } from "../../config/pipeline/schema.js";
import { isRecord, type JsonObject } from "../../types/json.js";
import { ErrorCode, type IssueCollector } from "../issues.js";
import { CLAIM_KEYWORDS, findTerm } from "../patterns.js";
import { checkSourceList, findingText, type ValidationContext } from "../stages.js";

export function checkSourceRegistry(
  output: JsonObject,
  contract: ContractOf<"source_registry">,
  _ctx: ValidationContext,
  issues: IssueCollector
): void {
  const registry = output["source_registry"];
  if (!isRecord(registry)) {
    issues.error(ErrorCode.INVALID_SECTION_TYPE, "source_registry must be an object", "$.source_registry");
    return;
  }

  const primary = registry["primary_sources"];
  if (!Array.isArray(primary) || primary.length === 0) {
    issues.error(
      ErrorCode.MISSING_PRIMARY_SOURCES,
      "source_registry.primary_sources must be a non-empty list",
      "$.source_registry.primary_sources"
    );
  } else {
    checkSourceList(primary, "$.source_registry.primary_sources", issues);
  }

  if ("secondary_sources" in registry) {
    checkSourceList(registry["secondary_sources"], "$.source_registry.secondary_sources", issues);
  }

  const keywords = contract.claim_keywords ?? CLAIM_KEYWORDS;
  const findings = output["findings"];
  if (Array.isArray(findings)) {
    findings.forEach((finding: unknown, index) => {
      const term = findTerm(findingText(finding), keywords);
      if (term !== null) {
        issues.error(
          ErrorCode.FACTUAL_CLAIM_IN_FINDINGS,
          `Finding contains a factual claim keyword: ${term}`,
          `$.findings[${index}]`
        );
      }
    });
  }
}
