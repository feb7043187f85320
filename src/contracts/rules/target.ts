/**
 * Lookup of the target company entity in a step delta.
 */

import { TARGET_ENTITY_ID } from "../../registry/id-allocator.js";
import type { JsonObject } from "../../types/json.js";
import { ErrorCode, type IssueCollector } from "../issues.js";
import { deltaEntities } from "../stages.js";

export interface TargetRef {
  entity: JsonObject;
  path: string;
}

/**
 * The delta entity with entity_id TGT-001, or null after reporting it
 * missing.
 */
export function requireTarget(output: JsonObject, issues: IssueCollector): TargetRef | null {
  const found = deltaEntities(output).find(({ entity }) => entity["entity_id"] === TARGET_ENTITY_ID);
  if (found === undefined) {
    issues.error(
      ErrorCode.MISSING_TARGET_ENTITY,
      `entities_delta must contain the target entity ${TARGET_ENTITY_ID}`,
      "$.entities_delta"
    );
    return null;
  }
  return { entity: found.entity, path: `$.entities_delta[${found.index}]` };
}
