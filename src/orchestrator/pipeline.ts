/**
 * Pipeline run: executes the DAG one step at a time.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STEP LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   pending → running → agent ─┬─ ok:false / throw → agent_error.json → halt (2)
 *                              └─ output.json → gatekeeper → validator.json
 *                                   ├─ errors → halt (3)
 *                                   └─ merge → entity_registry.json → validated_ok
 *
 * The first failure halts the run; every later step is logged and recorded
 * as skipped. After the last step the registry is exported (failures exit 4).
 * A run manifest is written whenever the run directory exists.
 */

import {
  assertPipelinePlan,
  ConfigError,
  config,
  loadDagFile,
  loadStepContractsFile,
  PipelineConfigError,
  VERSION_ENV_KEYS,
  type Dag,
  type DagStep,
  type MetaKey,
  type StepContract,
} from "../config/index.js";
import { AGENT_FACTORIES, registeredStepIds, type AgentFactory } from "../agents/registry.js";
import { formatUtc } from "../agents/step-meta.js";
import type { AgentInput, AgentResult } from "../agents/types.js";
import type { CrossrefReport } from "../contracts/crossref.js";
import { formatIssue } from "../contracts/issues.js";
import { isPipelineVersion } from "../contracts/patterns.js";
import { validateStepOutput } from "../contracts/validator.js";
import { writeExports } from "../exporters/exports.js";
import { createLogger, initRunId, isValidRunId, parseLogLevel, type Logger } from "../logging/index.js";
import { EntityRegistry, RegistryError } from "../registry/entity-registry.js";
import { IdAllocator } from "../registry/id-allocator.js";
import { mergeRegistry } from "../registry/merger.js";
import { readString, type JsonObject } from "../types/json.js";
import {
  CaseNormalizedSchema,
  StepStatus,
  TargetEntityStubSchema,
  type MetaPayloads,
  type StepOutput,
} from "../types/pipeline.js";
import { relativeArtifactPath, writeJsonAtomic, type ManifestEntry } from "./artifact-store.js";
import { AgentFailureError, errorMessage, GatekeeperError, PipelineHaltError, ReportError } from "./errors.js";
import { ExitCode } from "./exit-codes.js";
import { createRunDirs, resolveRunPaths, type RunPaths } from "./run-context.js";
import { StepScheduler } from "./scheduler.js";

export interface RunPipelineOptions {
  runId: string;
  /** Parsed case file */
  caseInput: JsonObject;
  /** Takes precedence over the environment and the case file */
  pipelineVersion?: string;
  artifactsRoot?: string;
  dagPath?: string;
  contractsPath?: string;
  /** Step → agent table; defaults to the built-in agents */
  agents?: ReadonlyMap<string, AgentFactory>;
  now?: () => Date;
  logLevel?: string;
  /** Echo log lines to the console (default true) */
  console?: boolean;
}

export interface StepRecord {
  step_id: string;
  status: StepStatus;
}

export interface PipelineRunResult {
  runId: string;
  exitCode: ExitCode;
  /** Run directory, or null when the run was refused before it was created */
  runRoot: string | null;
  steps: StepRecord[];
  skippedSteps: string[];
  failedStep?: string;
  error?: string;
  crossref?: CrossrefReport;
  exports: ManifestEntry[];
}

/**
 * Pipeline version for this run: explicit override, then the PIPELINE_VERSION
 * or GIT_SHA environment variable, then `pipeline_version` or `git_sha` in
 * the case file.
 *
 * @throws ConfigError if none is set or the value is neither a git SHA nor SemVer
 */
export function resolvePipelineVersion(
  override: string | undefined,
  caseInput: JsonObject,
  envValue: string | undefined = config.pipelineVersion
): string {
  const candidates = [
    override?.trim() ?? "",
    envValue ?? "",
    readString(caseInput["pipeline_version"]),
    readString(caseInput["git_sha"]),
  ];
  const version = candidates.find((value) => value !== "");
  if (version === undefined) {
    throw new ConfigError(
      `No pipeline version: pass --pipeline-version, set ${VERSION_ENV_KEYS.join(" or ")}, or add pipeline_version to the case file`
    );
  }
  if (!isPipelineVersion(version)) {
    throw new ConfigError(`Pipeline version ${version} is neither a git SHA nor a SemVer version`);
  }
  return version;
}

/** The intake payloads a step's DAG node declares it consumes. */
function consumedMeta(consumes: readonly MetaKey[], meta: MetaPayloads): MetaPayloads {
  const selected: MetaPayloads = {};
  if (consumes.includes("case_normalized") && meta.case_normalized !== undefined) {
    selected.case_normalized = meta.case_normalized;
  }
  if (consumes.includes("target_entity_stub") && meta.target_entity_stub !== undefined) {
    selected.target_entity_stub = meta.target_entity_stub;
  }
  return selected;
}

interface RunState {
  runId: string;
  pipelineVersion: string;
  caseInput: JsonObject;
  contracts: ReadonlyMap<string, StepContract>;
  agents: ReadonlyMap<string, AgentFactory>;
  paths: RunPaths;
  logger: Logger;
  now: () => Date;
  registry: EntityRegistry;
  allocator: IdAllocator;
  scheduler: StepScheduler;
  meta: MetaPayloads;
}

async function invokeAgent(state: RunState, step: DagStep): Promise<AgentResult> {
  const factory = state.agents.get(step.step_id);
  if (factory === undefined) {
    throw new PipelineConfigError(`No agent registered for step ${step.step_id}`, [
      { path: [step.step_id], message: "no agent", code: "missing_agent" },
    ]);
  }
  const agent = factory();
  const input: AgentInput = {
    runId: state.runId,
    pipelineVersion: state.pipelineVersion,
    caseInput: state.caseInput,
    meta: consumedMeta(step.consumes, state.meta),
    registry: state.registry.toDict(),
    now: state.now,
  };
  try {
    return await agent.run(input);
  } catch (err) {
    return { ok: false, output: { error: errorMessage(err) } };
  }
}

/** Keep the intake payloads a step published, for the steps after it. */
function captureMeta(state: RunState, output: StepOutput): void {
  if ("case_normalized" in output) {
    const parsed = CaseNormalizedSchema.safeParse(output.case_normalized);
    if (parsed.success) {
      state.meta.case_normalized = parsed.data;
      writeJsonAtomic(state.paths.metaPayload("case_normalized"), parsed.data);
    }
  }
  if ("target_entity_stub" in output) {
    const parsed = TargetEntityStubSchema.safeParse(output.target_entity_stub);
    if (parsed.success) {
      state.meta.target_entity_stub = parsed.data;
      writeJsonAtomic(state.paths.metaPayload("target_entity_stub"), parsed.data);
    }
  }
}

async function executeStep(state: RunState, step: DagStep): Promise<void> {
  const { scheduler, paths, logger } = state;
  const stepId = step.step_id;
  const contract = state.contracts.get(stepId);
  if (contract === undefined) {
    throw new PipelineConfigError(`No contract for step ${stepId}`, [
      { path: [stepId], message: "no contract", code: "missing_contract" },
    ]);
  }

  scheduler.markRunning(stepId);
  logger.info(`Running ${stepId}`, { description: contract.description });

  const result = await invokeAgent(state, step);
  if (!result.ok) {
    writeJsonAtomic(paths.stepAgentError(stepId), result.output);
    scheduler.markFinished(stepId, StepStatus.AgentFailed);
    throw new AgentFailureError(stepId, result.output.error, result.output.details);
  }

  writeJsonAtomic(paths.stepOutput(stepId), result.output);
  const verdict = validateStepOutput(result.output, {
    stepId,
    contract,
    caseNormalized: state.meta.case_normalized,
    now: state.now(),
  });
  writeJsonAtomic(paths.stepValidator(stepId), verdict);

  for (const warning of verdict.warnings) {
    logger.warn(`${stepId}: ${formatIssue(warning)}`);
  }
  if (!verdict.ok) {
    for (const issue of verdict.errors) {
      logger.error(`${stepId}: ${formatIssue(issue)}`);
    }
    scheduler.markFinished(stepId, StepStatus.ValidatedFailed);
    writeJsonAtomic(paths.registry, state.registry.toDict());
    throw new GatekeeperError(stepId, verdict.errors);
  }

  const report = mergeRegistry({
    registry: state.registry,
    entitiesDelta: result.output.entities_delta,
    relationsDelta: result.output.relations_delta,
    allocator: state.allocator,
  });
  writeJsonAtomic(paths.registry, state.registry.toDict());
  captureMeta(state, result.output);

  scheduler.markFinished(stepId, StepStatus.ValidatedOk);
  logger.info(`${stepId} validated and merged`, {
    newEntities: report.newEntities,
    updatedEntities: report.updatedEntities,
    newRelations: report.newRelations,
  });
}

function exitCodeFor(err: unknown): ExitCode | null {
  if (err instanceof PipelineHaltError) {
    return err.exitCode;
  }
  if (err instanceof PipelineConfigError || err instanceof ConfigError || err instanceof RegistryError) {
    return ExitCode.CONFIG;
  }
  return null;
}

function describeError(err: unknown): string {
  return err instanceof PipelineConfigError ? err.format() : errorMessage(err);
}

/**
 * Run every DAG step for one case file.
 *
 * Halting failures are reported through `exitCode`; only unexpected errors
 * are thrown.
 */
export async function runPipeline(options: RunPipelineOptions): Promise<PipelineRunResult> {
  const now = options.now ?? (() => new Date());
  const runId = options.runId.trim();
  const level = parseLogLevel(options.logLevel ?? config.logLevel);
  initRunId(runId);

  const refused = (err: unknown): PipelineRunResult => {
    createLogger({ level, console: options.console ?? true, file: false, now }).error(describeError(err));
    return {
      runId,
      exitCode: ExitCode.CONFIG,
      runRoot: null,
      steps: [],
      skippedSteps: [],
      error: errorMessage(err),
      exports: [],
    };
  };

  const agents = options.agents ?? AGENT_FACTORIES;
  let pipelineVersion: string;
  let dag: Dag;
  let contracts: ReadonlyMap<string, StepContract>;
  try {
    if (!isValidRunId(runId)) {
      throw new ConfigError(`Invalid run ID: ${JSON.stringify(options.runId)}`);
    }
    pipelineVersion = resolvePipelineVersion(options.pipelineVersion, options.caseInput);
    dag = loadDagFile(options.dagPath ?? config.dagPath);
    contracts = loadStepContractsFile(options.contractsPath ?? config.contractsPath);
    assertPipelinePlan(dag, contracts, registeredStepIds(agents));
  } catch (err) {
    if (exitCodeFor(err) === ExitCode.CONFIG) {
      return refused(err);
    }
    throw err;
  }

  const paths = resolveRunPaths(options.artifactsRoot ?? config.artifactsRoot, runId);
  createRunDirs(paths);
  const logger = createLogger({
    level,
    logDir: paths.logsDir,
    logFile: "pipeline.log",
    console: options.console ?? true,
    now,
  });
  const startedAt = now();
  writeJsonAtomic(paths.caseInput, options.caseInput);
  logger.info("Pipeline run started", { pipelineVersion, steps: dag.steps.length });

  const state: RunState = {
    runId,
    pipelineVersion,
    caseInput: options.caseInput,
    contracts,
    agents,
    paths,
    logger,
    now,
    registry: EntityRegistry.create(),
    allocator: new IdAllocator(),
    scheduler: new StepScheduler(dag),
    meta: {},
  };

  const result: PipelineRunResult = {
    runId,
    exitCode: ExitCode.OK,
    runRoot: paths.runRoot,
    steps: [],
    skippedSteps: [],
    exports: [],
  };

  try {
    for (let step = state.scheduler.next(); step !== null; step = state.scheduler.next()) {
      await executeStep(state, step);
    }

    try {
      const exported = writeExports({
        exportsDir: paths.exportsDir,
        runRoot: paths.runRoot,
        runId,
        registry: state.registry.toDict(),
        generatedAt: now(),
      });
      result.crossref = exported.crossref;
      result.exports = exported.files;
      if (!exported.crossref.ok) {
        logger.warn(`Crossref audit found ${exported.crossref.errors.length} error(s)`);
      }
    } catch (err) {
      throw new ReportError(errorMessage(err));
    }
  } catch (err) {
    const exitCode = exitCodeFor(err);
    if (exitCode === null) {
      throw err;
    }
    result.exitCode = exitCode;
    result.error = errorMessage(err);
    if (err instanceof PipelineHaltError && err.stepId !== undefined) {
      result.failedStep = err.stepId;
    }
    logger.error(describeError(err));

    result.skippedSteps = state.scheduler.skipRemaining();
    if (result.skippedSteps.length > 0) {
      logger.warn(`Skipping ${result.skippedSteps.length} step(s): ${result.skippedSteps.join(", ")}`);
    }
  }

  result.steps = state.scheduler.snapshot();
  writeJsonAtomic(paths.manifest, {
    run_id: runId,
    pipeline_version: pipelineVersion,
    status: result.exitCode === ExitCode.OK ? "succeeded" : "failed",
    exit_code: result.exitCode,
    started_at_utc: formatUtc(startedAt),
    finished_at_utc: formatUtc(now()),
    steps: result.steps,
    skipped_steps: result.skippedSteps,
    failed_step: result.failedStep,
    error: result.error,
    exports: result.exports,
    log_file: logger.filePath === null ? null : relativeArtifactPath(logger.filePath, paths.runRoot),
  });
  logger.info(`Pipeline run finished with exit code ${result.exitCode}`);

  return result;
}
