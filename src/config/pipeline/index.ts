/**
 * Pipeline configuration module: DAG and step contracts.
 *
 * Usage:
 *   import { loadDagFile, loadStepContractsFile } from "./config/index.js";
 *
 *   const dag = loadDagFile("configs/pipeline/dag.json");
 *   const contracts = loadStepContractsFile("configs/pipeline/step-contracts.json");
 */

export type {
  Dag,
  DagStep,
  Barrier,
  StepContract,
  StepContracts,
  ContractKind,
  ContractOf,
} from "./schema.js";

export {
  DagSchema,
  DagStepSchema,
  BarrierSchema,
  StepContractSchema,
  StepContractsSchema,
  StepIdSchema,
  MetaKey,
  DEFAULT_STEP_META_FIELDS,
} from "./schema.js";

export {
  loadDag,
  loadDagFile,
  loadStepContracts,
  loadStepContractsFile,
  readJsonFile,
  checkPipelinePlan,
  assertPipelinePlan,
  PipelineConfigError,
  type PipelineConfigIssue,
} from "./loader.js";
