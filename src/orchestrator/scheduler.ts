/**
 * Step scheduler.
 *
 * Tracks one state per DAG step and answers which step may run next. Steps
 * run one at a time in declared order; a dependency is satisfied when the
 * named step (or every step of the named barrier) is validated_ok.
 */

import type { Dag, DagStep } from "../config/pipeline/schema.js";
import { PipelineConfigError } from "../config/pipeline/loader.js";
import { StepStatus } from "../types/pipeline.js";

const TERMINAL_FAILURES: ReadonlySet<StepStatus> = new Set([
  StepStatus.ValidatedFailed,
  StepStatus.AgentFailed,
]);

export class StepScheduler {
  private readonly states = new Map<string, StepStatus>();
  private readonly barriers: ReadonlyMap<string, readonly string[]>;

  constructor(private readonly dag: Dag) {
    this.barriers = new Map(dag.barriers.map((b) => [b.name, b.steps]));
    for (const step of dag.steps) {
      this.states.set(step.step_id, StepStatus.Pending);
    }
  }

  /** Step IDs a dependency stands for: the barrier's members, or itself. */
  expandDependency(dep: string): readonly string[] {
    return this.barriers.get(dep) ?? [dep];
  }

  status(stepId: string): StepStatus | undefined {
    return this.states.get(stepId);
  }

  /** Steps in validated_ok state, in DAG order. */
  completed(): string[] {
    return this.dag.steps
      .map((s) => s.step_id)
      .filter((id) => this.states.get(id) === StepStatus.ValidatedOk);
  }

  isBarrierReached(name: string): boolean {
    const members = this.barriers.get(name);
    return members !== undefined && members.every((id) => this.states.get(id) === StepStatus.ValidatedOk);
  }

  /** Dependencies of `step` that are not yet satisfied. */
  unmetDependencies(step: DagStep): string[] {
    return step.depends_on.filter((dep) =>
      this.expandDependency(dep).some((id) => this.states.get(id) !== StepStatus.ValidatedOk)
    );
  }

  isReady(step: DagStep): boolean {
    return this.states.get(step.step_id) === StepStatus.Pending && this.unmetDependencies(step).length === 0;
  }

  /**
   * The next step to run: the first pending step in declared order. Null
   * once the run halted or every step is done.
   *
   * @throws PipelineConfigError if that step's dependencies are unmet
   */
  next(): DagStep | null {
    if (this.halted) {
      return null;
    }
    const step = this.dag.steps.find((s) => this.states.get(s.step_id) === StepStatus.Pending);
    if (step === undefined) {
      return null;
    }
    const unmet = this.unmetDependencies(step);
    if (unmet.length > 0) {
      throw new PipelineConfigError(
        `Step ${step.step_id} has unmet dependencies: ${unmet.join(", ")}`,
        [{ path: [step.step_id, "depends_on"], message: `unmet: ${unmet.join(", ")}`, code: "unmet_dependency" }]
      );
    }
    return step;
  }

  markRunning(stepId: string): void {
    this.transition(stepId, StepStatus.Pending, StepStatus.Running);
  }

  markFinished(stepId: string, status: StepStatus.ValidatedOk | StepStatus.ValidatedFailed | StepStatus.AgentFailed): void {
    this.transition(stepId, StepStatus.Running, status);
  }

  get halted(): boolean {
    for (const status of this.states.values()) {
      if (TERMINAL_FAILURES.has(status)) {
        return true;
      }
    }
    return false;
  }

  /** Mark every pending step skipped and return their IDs in DAG order. */
  skipRemaining(): string[] {
    const skipped: string[] = [];
    for (const step of this.dag.steps) {
      if (this.states.get(step.step_id) === StepStatus.Pending) {
        this.states.set(step.step_id, StepStatus.Skipped);
        skipped.push(step.step_id);
      }
    }
    return skipped;
  }

  /** Step ID → state, in DAG order. */
  snapshot(): Array<{ step_id: string; status: StepStatus }> {
    return this.dag.steps.map((s) => ({
      step_id: s.step_id,
      status: this.states.get(s.step_id) ?? StepStatus.Pending,
    }));
  }

  private transition(stepId: string, from: StepStatus, to: StepStatus): void {
    const current = this.states.get(stepId);
    if (current !== from) {
      throw new Error(`Step ${stepId} cannot move from ${String(current)} to ${to}`);
    }
    this.states.set(stepId, to);
  }
}
