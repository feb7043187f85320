/**
 * Step scheduler tests.
 *
 * Run with: node --import tsx --test src/orchestrator/scheduler.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { loadDag, PipelineConfigError } from "../config/pipeline/loader.js";
import { StepStatus } from "../types/pipeline.js";
import { StepScheduler } from "./scheduler.js";

const DAG = loadDag({
  steps: [
    { step_id: "AG-00" },
    { step_id: "AG-10", depends_on: ["AG-00"] },
    { step_id: "AG-11", depends_on: ["AG-00"] },
    { step_id: "AG-21", depends_on: ["identity_complete"] },
  ],
  barriers: [{ name: "identity_complete", steps: ["AG-10", "AG-11"] }],
});

function complete(scheduler: StepScheduler, stepId: string): void {
  scheduler.markRunning(stepId);
  scheduler.markFinished(stepId, StepStatus.ValidatedOk);
}

describe("StepScheduler", () => {
  test("hands out steps in declared order", () => {
    const scheduler = new StepScheduler(DAG);
    const order: string[] = [];
    for (let step = scheduler.next(); step !== null; step = scheduler.next()) {
      order.push(step.step_id);
      complete(scheduler, step.step_id);
    }
    assert.deepEqual(order, ["AG-00", "AG-10", "AG-11", "AG-21"]);
    assert.deepEqual(scheduler.completed(), order);
  });

  test("a barrier is reached only when all its steps completed", () => {
    const scheduler = new StepScheduler(DAG);
    const research = DAG.steps[3];
    complete(scheduler, "AG-00");
    complete(scheduler, "AG-10");
    assert.equal(scheduler.isBarrierReached("identity_complete"), false);
    assert.equal(scheduler.isReady(research), false);
    assert.deepEqual(scheduler.unmetDependencies(research), ["identity_complete"]);

    complete(scheduler, "AG-11");
    assert.equal(scheduler.isBarrierReached("identity_complete"), true);
    assert.equal(scheduler.isReady(research), true);
  });

  test("refuses a step whose dependency comes later", () => {
    const scheduler = new StepScheduler(
      loadDag({ steps: [{ step_id: "AG-10", depends_on: ["AG-00"] }, { step_id: "AG-00" }] })
    );
    assert.throws(() => scheduler.next(), PipelineConfigError);
  });

  test("halts after a failure and skips the rest", () => {
    const scheduler = new StepScheduler(DAG);
    complete(scheduler, "AG-00");
    scheduler.markRunning("AG-10");
    scheduler.markFinished("AG-10", StepStatus.ValidatedFailed);

    assert.equal(scheduler.halted, true);
    assert.equal(scheduler.next(), null);
    assert.deepEqual(scheduler.skipRemaining(), ["AG-11", "AG-21"]);
    assert.deepEqual(scheduler.snapshot(), [
      { step_id: "AG-00", status: "validated_ok" },
      { step_id: "AG-10", status: "validated_failed" },
      { step_id: "AG-11", status: "skipped" },
      { step_id: "AG-21", status: "skipped" },
    ]);
  });

  test("rejects out-of-order transitions", () => {
    const scheduler = new StepScheduler(DAG);
    assert.throws(() => scheduler.markFinished("AG-00", StepStatus.ValidatedOk), /cannot move from pending/);
  });
});
