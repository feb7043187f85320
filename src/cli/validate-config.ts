#!/usr/bin/env node
/**
 * CLI command to validate the pipeline configuration.
 *
 * Validates:
 * - Environment (NODE_ENV, LOG_LEVEL)
 * - DAG (schema, duplicate steps, dangling dependencies and barriers)
 * - Step contracts (schema per contract kind, duplicates)
 * - Plan: every DAG step has a contract and an agent, dependencies are
 *   declared before their dependents, no contract without a step
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --dag <path>        DAG file (default: configs/pipeline/dag.json)
 *   --contracts <path>  Step contracts file (default: configs/pipeline/step-contracts.json)
 *   --json              Output entire report as JSON (for CI parsing)
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { parseArgs } from "node:util";

import {
  checkPipelinePlan,
  config,
  validateConfig,
  loadDagFile,
  loadStepContractsFile,
  PipelineConfigError,
  type Dag,
  type PipelineConfigIssue,
  type StepContract,
} from "../config/index.js";
import { registeredStepIds } from "../agents/registry.js";

// ============================================================
// Types
// ============================================================

interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
    dagSteps?: number;
    barriers?: number;
    contracts?: number;
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      dag: { type: "string", default: config.dagPath },
      contracts: { type: "string", default: config.contractsPath },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --dag <path>        DAG file (default: ${config.dagPath})
  --contracts <path>  Step contracts file (default: ${config.contractsPath})
  --json              Output entire report as JSON (for CI parsing)
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Pipeline Configuration Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printStep(step: StepResult): void {
  const mark = step.success ? c("green", "✓") : c("red", "✗");
  console.log(`${mark} ${c("bold", step.component)}: ${step.message}`);
  for (const detail of step.details ?? []) {
    console.log(`    ${step.success ? c("dim", "•") : c("red", "•")} ${detail}`);
  }
}

function printFooter(passed: number, failed: number): void {
  console.log("");
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

function formatIssues(issues: readonly PipelineConfigIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message} [${issue.code}]`;
  });
}

function failure(component: string, err: unknown): StepResult {
  if (err instanceof PipelineConfigError) {
    return { success: false, component, message: err.message, details: formatIssues(err.issues) };
  }
  return { success: false, component, message: err instanceof Error ? err.message : String(err) };
}

// ============================================================
// Validation Steps
// ============================================================

function runEnvironmentStep(): StepResult {
  try {
    validateConfig();
    return {
      success: true,
      component: "Environment",
      message: `${config.env}, log level ${config.logLevel}`,
    };
  } catch (err) {
    return failure("Environment", err);
  }
}

function runDagStep(path: string): { step: StepResult; dag: Dag | null } {
  try {
    const dag = loadDagFile(path);
    return {
      step: {
        success: true,
        component: "DAG",
        message: `${dag.steps.length} step(s), ${dag.barriers.length} barrier(s) from ${path}`,
      },
      dag,
    };
  } catch (err) {
    return { step: failure("DAG", err), dag: null };
  }
}

function runContractsStep(path: string): {
  step: StepResult;
  contracts: ReadonlyMap<string, StepContract> | null;
} {
  try {
    const contracts = loadStepContractsFile(path);
    const kinds = new Map<string, number>();
    for (const contract of contracts.values()) {
      kinds.set(contract.kind, (kinds.get(contract.kind) ?? 0) + 1);
    }
    return {
      step: {
        success: true,
        component: "Step contracts",
        message: `${contracts.size} contract(s) from ${path}`,
        details: [...kinds].map(([kind, count]) => `${kind}: ${count}`),
      },
      contracts,
    };
  } catch (err) {
    return { step: failure("Step contracts", err), contracts: null };
  }
}

function runPlanStep(dag: Dag, contracts: ReadonlyMap<string, StepContract>): StepResult {
  const issues = checkPipelinePlan(dag, contracts, registeredStepIds());
  if (issues.length > 0) {
    return {
      success: false,
      component: "Pipeline plan",
      message: `${issues.length} inconsistency(ies)`,
      details: formatIssues(issues),
    };
  }
  return {
    success: true,
    component: "Pipeline plan",
    message: "DAG, contracts and agents agree",
  };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  const steps: StepResult[] = [runEnvironmentStep()];

  const { step: dagStep, dag } = runDagStep(args.dag ?? config.dagPath);
  steps.push(dagStep);
  const { step: contractsStep, contracts } = runContractsStep(args.contracts ?? config.contractsPath);
  steps.push(contractsStep);
  if (dag !== null && contracts !== null) {
    steps.push(runPlanStep(dag, contracts));
  }

  const failed = steps.filter((s) => !s.success).length;
  const report: ValidationReport = {
    timestamp: new Date().toISOString(),
    steps,
    summary: {
      stepsPassed: steps.length - failed,
      stepsFailed: failed,
      stepsTotal: steps.length,
      dagSteps: dag?.steps.length,
      barriers: dag?.barriers.length,
      contracts: contracts?.size,
    },
  };

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printHeader();
    steps.forEach(printStep);
    printFooter(report.summary.stepsPassed, failed);
  }

  process.exit(failed > 0 ? 1 : 0);
}

main().catch((err: unknown) => {
  console.error("Unexpected error:", config.debug ? err : String(err));
  process.exit(1);
});
