/**
 * Pipeline configuration loader and plan checks.
 *
 * Responsible for:
 * - Reading the DAG and step contract files
 * - Validating them against their schemas with fail-fast behavior
 * - Cross-checking steps, barriers, contracts and agents against each other
 * - Freezing the result so no step can alter the plan mid-run
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import {
  DagSchema,
  StepContractsSchema,
  type Dag,
  type StepContract,
  type StepContracts,
} from "./schema.js";

/**
 * Individual configuration issue.
 */
export interface PipelineConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or one of the plan check codes below */
  code: string;
}

/**
 * Structured error for DAG / contract configuration.
 */
export class PipelineConfigError extends Error {
  public readonly issues: PipelineConfigIssue[];

  constructor(message: string, issues: PipelineConfigIssue[]) {
    super(message);
    this.name = "PipelineConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): PipelineConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Read and parse a JSON file, reporting a missing file or bad JSON as a
 * configuration error.
 */
export function readJsonFile(filePath: string, label: string): unknown {
  if (!existsSync(filePath)) {
    throw new PipelineConfigError(`${label} not found: ${filePath}`, [
      { path: [], message: "file does not exist", code: "file_not_found" },
    ]);
  }
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new PipelineConfigError(`${label} is not valid JSON: ${filePath}`, [
      {
        path: [],
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// DAG
// ═══════════════════════════════════════════════════════════════════════════

function checkDagReferences(dag: Dag): PipelineConfigIssue[] {
  const issues: PipelineConfigIssue[] = [];
  const stepIds = new Set<string>();

  dag.steps.forEach((step, index) => {
    if (stepIds.has(step.step_id)) {
      issues.push({
        path: ["steps", index, "step_id"],
        message: `Duplicate step ${step.step_id}`,
        code: "duplicate_step",
      });
    }
    stepIds.add(step.step_id);
  });

  const barrierNames = new Set<string>();
  dag.barriers.forEach((barrier, index) => {
    if (barrierNames.has(barrier.name) || stepIds.has(barrier.name)) {
      issues.push({
        path: ["barriers", index, "name"],
        message: `Barrier name ${barrier.name} is already in use`,
        code: "duplicate_barrier",
      });
    }
    barrierNames.add(barrier.name);
    barrier.steps.forEach((member, memberIndex) => {
      if (!stepIds.has(member)) {
        issues.push({
          path: ["barriers", index, "steps", memberIndex],
          message: `Barrier ${barrier.name} references unknown step ${member}`,
          code: "unknown_dependency",
        });
      }
    });
  });

  dag.steps.forEach((step, index) => {
    step.depends_on.forEach((dep, depIndex) => {
      if (dep === step.step_id) {
        issues.push({
          path: ["steps", index, "depends_on", depIndex],
          message: `${step.step_id} depends on itself`,
          code: "self_dependency",
        });
      } else if (!stepIds.has(dep) && !barrierNames.has(dep)) {
        issues.push({
          path: ["steps", index, "depends_on", depIndex],
          message: `${step.step_id} depends on unknown step or barrier ${dep}`,
          code: "unknown_dependency",
        });
      }
    });
  });

  return issues;
}

/**
 * Validate and freeze a DAG definition.
 *
 * @throws PipelineConfigError on schema violations or dangling references
 */
export function loadDag(input: unknown): Readonly<Dag> {
  const result = DagSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid DAG: ${issues.length} validation error(s)`,
      issues
    );
  }

  const issues = checkDagReferences(result.data);
  if (issues.length > 0) {
    throw new PipelineConfigError(
      `Invalid DAG: ${issues.length} reference error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

export function loadDagFile(filePath: string): Readonly<Dag> {
  return loadDag(readJsonFile(filePath, "DAG file"));
}

// ═══════════════════════════════════════════════════════════════════════════
// STEP CONTRACTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate step contracts and index them by step ID.
 *
 * @throws PipelineConfigError on schema violations or duplicate step IDs
 */
export function loadStepContracts(
  input: unknown
): ReadonlyMap<string, StepContract> {
  const result = StepContractsSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid step contracts: ${issues.length} validation error(s)`,
      issues
    );
  }

  const contracts: StepContracts = deepFreeze(result.data);
  const byStep = new Map<string, StepContract>();
  const issues: PipelineConfigIssue[] = [];

  contracts.steps.forEach((contract, index) => {
    if (byStep.has(contract.step_id)) {
      issues.push({
        path: ["steps", index, "step_id"],
        message: `Duplicate contract for ${contract.step_id}`,
        code: "duplicate_contract",
      });
      return;
    }
    byStep.set(contract.step_id, contract);
  });

  if (issues.length > 0) {
    throw new PipelineConfigError(
      `Invalid step contracts: ${issues.length} error(s)`,
      issues
    );
  }

  return byStep;
}

export function loadStepContractsFile(
  filePath: string
): ReadonlyMap<string, StepContract> {
  return loadStepContracts(readJsonFile(filePath, "Step contracts file"));
}

// ═══════════════════════════════════════════════════════════════════════════
// PLAN CHECK
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Cross-check a loaded DAG against its contracts and the agents available
 * to run it. Returns every problem found; an empty list means the run may
 * start.
 *
 * Checks:
 * - every DAG step has a contract and an agent
 * - every contract belongs to a DAG step
 * - every dependency (or barrier member) is declared earlier in DAG order
 */
export function checkPipelinePlan(
  dag: Dag,
  contracts: ReadonlyMap<string, StepContract>,
  agentStepIds: ReadonlySet<string>
): PipelineConfigIssue[] {
  const issues: PipelineConfigIssue[] = [];
  const dagStepIds = new Set(dag.steps.map((s) => s.step_id));
  const barriers = new Map(dag.barriers.map((b) => [b.name, b.steps]));
  const declared = new Set<string>();

  dag.steps.forEach((step, index) => {
    if (!contracts.has(step.step_id)) {
      issues.push({
        path: ["steps", index],
        message: `No contract for step ${step.step_id}`,
        code: "missing_contract",
      });
    }
    if (!agentStepIds.has(step.step_id)) {
      issues.push({
        path: ["steps", index],
        message: `No agent registered for step ${step.step_id}`,
        code: "missing_agent",
      });
    }

    for (const dep of step.depends_on) {
      const required = barriers.get(dep) ?? [dep];
      for (const id of required) {
        if (!declared.has(id)) {
          issues.push({
            path: ["steps", index, "depends_on"],
            message: `${step.step_id} depends on ${id}, which is not declared before it`,
            code: "dependency_order",
          });
        }
      }
    }

    declared.add(step.step_id);
  });

  for (const stepId of contracts.keys()) {
    if (!dagStepIds.has(stepId)) {
      issues.push({
        path: [stepId],
        message: `Contract for ${stepId} has no DAG step`,
        code: "orphan_contract",
      });
    }
  }

  return issues;
}

/**
 * Throwing variant of checkPipelinePlan for run startup.
 */
export function assertPipelinePlan(
  dag: Dag,
  contracts: ReadonlyMap<string, StepContract>,
  agentStepIds: ReadonlySet<string>
): void {
  const issues = checkPipelinePlan(dag, contracts, agentStepIds);
  if (issues.length > 0) {
    throw new PipelineConfigError(
      `Pipeline plan is inconsistent: ${issues.length} error(s)`,
      issues
    );
  }
}
