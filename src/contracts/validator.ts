/**
 * Contract gatekeeper: decides whether a step's output may be merged.
 */

import { isRecord } from "../types/json.js";
import { ErrorCode, IssueCollector, type ValidatorResult } from "./issues.js";
import { applyStepRules } from "./rules/index.js";
import {
  checkSections,
  checkShapes,
  checkStepMeta,
  type Stage,
  type ValidationContext,
} from "./stages.js";

export const VALIDATION_STAGES: readonly Stage[] = [
  checkSections,
  checkShapes,
  checkStepMeta,
  applyStepRules,
];

/**
 * Validate one step output against its contract.
 *
 * Stops after the first stage with errors; warnings from earlier stages
 * are kept. `ok` is true exactly when there are no errors.
 */
export function validateStepOutput(output: unknown, ctx: ValidationContext): ValidatorResult {
  const issues = new IssueCollector();

  if (!isRecord(output)) {
    issues.error(ErrorCode.INVALID_SECTION_TYPE, "Step output must be a JSON object", "$");
  } else {
    for (const stage of VALIDATION_STAGES) {
      stage(output, ctx, issues);
      if (issues.hasErrors) {
        break;
      }
    }
  }

  return {
    ok: !issues.hasErrors,
    step_id: ctx.stepId,
    errors: issues.errors,
    warnings: issues.warnings,
  };
}
