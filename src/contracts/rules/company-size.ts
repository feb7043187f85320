/**
 * Company size rules: identity continuity for the target entity and
 * evidence for every size signal that carries a value.
 */

import type { ContractOf } from "../../config/pipeline/schema.js";
import { isPlaceholder } from "../../registry/schema.js";
import { isRecord, type JsonObject } from "../../types/json.js";
import { ErrorCode, joinPath, type IssueCollector } from "../issues.js";
import {
  checkIdentityContinuity,
  checkSourceList,
  entityField,
  type ValidationContext,
} from "../stages.js";
import { requireTarget } from "./target.js";

interface SizeSignal {
  field: string;
  value: unknown;
  path: string;
}

/**
 * Size signals are read from the entity itself first, then from
 * `company_size_profile.quantitative_metrics`.
 */
function readSizeSignals(
  target: JsonObject,
  targetPath: string,
  fields: readonly string[]
): SizeSignal[] {
  const profile = entityField(target, "company_size_profile");
  const profilePath =
    "company_size_profile" in target
      ? joinPath(targetPath, "company_size_profile")
      : joinPath(joinPath(targetPath, "attributes"), "company_size_profile");
  const metrics = isRecord(profile) ? profile["quantitative_metrics"] : undefined;
  const metricsPath = joinPath(profilePath, "quantitative_metrics");

  const signals: SizeSignal[] = [];
  for (const field of fields) {
    const direct = entityField(target, field);
    if (direct !== undefined) {
      const path =
        field in target ? joinPath(targetPath, field) : joinPath(joinPath(targetPath, "attributes"), field);
      signals.push({ field, value: direct, path });
    } else if (isRecord(metrics) && field in metrics) {
      signals.push({ field, value: metrics[field], path: joinPath(metricsPath, field) });
    }
  }
  return signals;
}

export function checkCompanySize(
  output: JsonObject,
  contract: ContractOf<"company_size">,
  ctx: ValidationContext,
  issues: IssueCollector
): void {
  const target = requireTarget(output, issues);
  if (target === null) {
    return;
  }

  checkIdentityContinuity(target.entity, target.path, ctx, issues);

  const claimed = readSizeSignals(target.entity, target.path, contract.size_fields).filter(
    (signal) => !isPlaceholder(signal.value)
  );

  for (const signal of claimed) {
    if (typeof signal.value !== "number" || !Number.isFinite(signal.value) || signal.value < 0) {
      issues.error(
        ErrorCode.INVALID_SIZE_SIGNAL,
        `${signal.field} must be a non-negative number`,
        signal.path
      );
    }
  }

  if (claimed.length === 0) {
    issues.warn(
      ErrorCode.NO_EVIDENCE_FOUND,
      "No verifiable company size evidence found; all size signals are n/v",
      target.path
    );
    return;
  }

  const sources = output["sources"];
  if (!Array.isArray(sources) || sources.length === 0) {
    issues.error(
      ErrorCode.MISSING_SOURCES_FOR_CLAIMS,
      `Size signals ${claimed.map((s) => s.field).join(", ")} have values but sources is empty`,
      "$.sources"
    );
  } else {
    checkSourceList(sources, "$.sources", issues);
  }
}
