/**
 * Step rules by contract kind.
 *
 * The table is keyed by every ContractKind, so adding a kind to the
 * contract schema without rules here fails to compile.
 */

import type { ContractKind, ContractOf } from "../../config/pipeline/schema.js";
import type { JsonObject } from "../../types/json.js";
import type { IssueCollector } from "../issues.js";
import type { Stage, ValidationContext } from "../stages.js";
import { checkCompanySize } from "./company-size.js";
import { checkIdentityLegal } from "./identity-legal.js";
import { checkIntake } from "./intake.js";
import { checkLocations } from "./locations.js";
import { checkSourceRegistry } from "./source-registry.js";

export type StepRule<K extends ContractKind> = (
  output: JsonObject,
  contract: ContractOf<K>,
  ctx: ValidationContext,
  issues: IssueCollector
) => void;

export const STEP_RULES: { readonly [K in ContractKind]: StepRule<K> } = {
  intake: checkIntake,
  source_registry: checkSourceRegistry,
  identity_legal: checkIdentityLegal,
  locations_sites: checkLocations,
  company_size: checkCompanySize,
  // Generic research steps: sections and step_meta only.
  research: () => undefined,
};

export const applyStepRules: Stage = (output, ctx, issues) => {
  const contract = ctx.contract;
  switch (contract.kind) {
    case "intake":
      return STEP_RULES.intake(output, contract, ctx, issues);
    case "source_registry":
      return STEP_RULES.source_registry(output, contract, ctx, issues);
    case "identity_legal":
      return STEP_RULES.identity_legal(output, contract, ctx, issues);
    case "locations_sites":
      return STEP_RULES.locations_sites(output, contract, ctx, issues);
    case "company_size":
      return STEP_RULES.company_size(output, contract, ctx, issues);
    case "research":
      return STEP_RULES.research(output, contract, ctx, issues);
  }
};
