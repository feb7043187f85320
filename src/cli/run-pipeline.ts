#!/usr/bin/env node
/**
 * CLI command to run the pipeline for one case file.
 *
 * Usage:
 *   npx tsx src/cli/run-pipeline.ts --run-id <id> --case-file <path> [options]
 *   npm run run-pipeline -- --run-id acme-001 --case-file cases/acme.json
 *
 * Options:
 *   --run-id <id>               Run ID; artifacts go to <root>/runs/<id>/ (required)
 *   --case-file <path>          JSON case file with company name and web domain (required)
 *   --pipeline-version <v>      Git SHA or SemVer; else PIPELINE_VERSION / GIT_SHA / case file
 *   --artifacts-root <dir>      Artifacts root (default: ARTIFACTS_ROOT or artifacts/)
 *   --dag <path>                DAG file (default: configs/pipeline/dag.json)
 *   --contracts <path>          Step contracts file (default: configs/pipeline/step-contracts.json)
 *   --json                      Print the run result as JSON
 *   -h, --help                  Show help
 *
 * Exit codes:
 *   0 - Run completed and exports written
 *   1 - Configuration error (DAG, contracts, registry, run ID, version, case file)
 *   2 - An agent failed
 *   3 - The gatekeeper rejected a step output
 *   4 - Export or report failed
 */

import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  readJsonFile,
  ConfigError,
  PipelineConfigError,
} from "../config/index.js";
import { ExitCode } from "../orchestrator/exit-codes.js";
import { runPipeline, type PipelineRunResult } from "../orchestrator/pipeline.js";
import { StepStatus } from "../types/pipeline.js";
import { isRecord } from "../types/json.js";

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      "run-id": { type: "string" },
      "case-file": { type: "string" },
      "pipeline-version": { type: "string" },
      "artifacts-root": { type: "string", default: config.artifactsRoot },
      dag: { type: "string", default: config.dagPath },
      contracts: { type: "string", default: config.contractsPath },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: run-pipeline --run-id <id> --case-file <path> [options]

Options:
  --run-id <id>               Run ID; artifacts go to <root>/runs/<id>/ (required)
  --case-file <path>          JSON case file with company name and web domain (required)
  --pipeline-version <v>      Git SHA or SemVer; else PIPELINE_VERSION / GIT_SHA / case file
  --artifacts-root <dir>      Artifacts root (default: ${config.artifactsRoot})
  --dag <path>                DAG file (default: ${config.dagPath})
  --contracts <path>          Step contracts file (default: ${config.contractsPath})
  --json                      Print the run result as JSON
  -h, --help                  Show this help message

Exit codes:
  0 - Run completed and exports written
  1 - Configuration error
  2 - An agent failed
  3 - The gatekeeper rejected a step output
  4 - Export or report failed
`);
    process.exit(ExitCode.OK);
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
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

const STATUS_MARKS: Record<StepStatus, string> = {
  [StepStatus.Pending]: c("dim", "·"),
  [StepStatus.Running]: c("yellow", "…"),
  [StepStatus.ValidatedOk]: c("green", "✓"),
  [StepStatus.ValidatedFailed]: c("red", "✗"),
  [StepStatus.AgentFailed]: c("red", "✗"),
  [StepStatus.Skipped]: c("dim", "-"),
};

function printResult(result: PipelineRunResult): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` Pipeline run ${result.runId}`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");

  for (const step of result.steps) {
    console.log(`  ${STATUS_MARKS[step.status]} ${step.step_id}  ${c("dim", step.status)}`);
  }

  if (result.crossref && !result.crossref.ok) {
    console.log("");
    console.log(c("yellow", `  Crossref audit: ${result.crossref.errors.length} error(s)`));
  }

  console.log("");
  console.log("─".repeat(60));
  if (result.exitCode === ExitCode.OK) {
    console.log(c("green", `✓ Run completed: ${result.steps.length} step(s)`));
  } else {
    console.log(c("red", `✗ Run failed (exit ${result.exitCode}): ${result.error ?? "unknown error"}`));
  }
  if (result.runRoot !== null) {
    console.log(`  Artifacts: ${result.runRoot}`);
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  try {
    validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(c("red", `Configuration error: ${err.message}`));
      process.exit(ExitCode.CONFIG);
    }
    throw err;
  }

  const args = parseCliArgs();

  const runId = args["run-id"];
  const caseFile = args["case-file"];
  if (!runId || !caseFile) {
    console.error(c("red", "Error: --run-id and --case-file are required"));
    console.error("  Usage: npm run run-pipeline -- --run-id <id> --case-file <path>");
    process.exit(ExitCode.CONFIG);
  }

  let caseInput: unknown;
  try {
    caseInput = readJsonFile(caseFile, "Case file");
  } catch (err) {
    if (err instanceof PipelineConfigError) {
      console.error(c("red", err.format()));
      process.exit(ExitCode.CONFIG);
    }
    throw err;
  }
  if (!isRecord(caseInput)) {
    console.error(c("red", `Error: case file ${caseFile} must contain a JSON object`));
    process.exit(ExitCode.CONFIG);
  }

  const result = await runPipeline({
    runId,
    caseInput,
    pipelineVersion: args["pipeline-version"],
    artifactsRoot: args["artifacts-root"],
    dagPath: args.dag,
    contractsPath: args.contracts,
    console: !args.json,
  });

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printResult(result);
  }

  process.exit(result.exitCode);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(c("red", `Unexpected error: ${message}`));
  if (config.debug && err instanceof Error && err.stack) {
    console.error(c("dim", err.stack));
  }
  process.exit(ExitCode.CONFIG);
});
