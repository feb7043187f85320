/**
 * Step output contracts: the gatekeeper and the crossref audit.
 */

export {
  ErrorCode,
  IssueCollector,
  formatIssue,
  type ValidationIssue,
  type ValidatorResult,
} from "./issues.js";
export { validateStepOutput, VALIDATION_STAGES } from "./validator.js";
export type { ValidationContext, IdentityReference, Stage } from "./stages.js";
export { STEP_RULES, type StepRule } from "./rules/index.js";
export { checkCrossrefIntegrity, findNonAsciiStrings, type CrossrefReport } from "./crossref.js";
export {
  isIsoUtc,
  isPipelineVersion,
  isValidDomain,
  isHttpUrl,
  REGISTER_MARKERS,
  CLAIM_KEYWORDS,
} from "./patterns.js";
