/**
 * Pipeline orchestrator.
 *
 * Runs stages strictly in sequence through a StageRunner backend and drives
 * the state machine from the step completions the backend reports. Step
 * failures are values: the first one fails the pipeline and nothing after
 * it runs.
 */

import { BUILDER_STAGE } from "../constants.js";
import { extractErrorDetails } from "../errors.js";
import { topologicalOrder } from "./graph.js";
import { PipelineStateMachine } from "./state-machine.js";
import {
  type BuildStep,
  type ImageStage,
  type PipelinePlan,
  type PipelineResult,
  PipelineState,
  type StageResult,
  type StepFailure,
  type StepOutcome,
} from "./types.js";

/** Progress callbacks a runner reports through while building one stage. */
export interface StageProgress {
  stepStarted(stepId: string): void;
  stepDone(stepId: string, cached: boolean): void;
}

/** Execution backend for a single stage. */
export interface StageRunner {
  runStage(stage: ImageStage, plan: PipelinePlan, progress: StageProgress): Promise<StageResult>;
}

/** Optional hooks for presenting pipeline progress. */
export interface PipelineObserver {
  onStageStart?(stage: ImageStage, index: number, total: number): void;
  onStepStart?(stage: ImageStage, step: BuildStep, position: number, total: number): void;
  onStepDone?(stage: ImageStage, outcome: StepOutcome): void;
  onStateChange?(from: PipelineState, to: PipelineState): void;
  onFailure?(failure: StepFailure): void;
}

export interface RunPipelineOptions {
  /** Check the build context against the plan first (default: true). */
  preflight?: boolean;
  observer?: PipelineObserver;
  /** Reported as the image of a successful run. */
  image?: string;
  /** Checked between stages. */
  signal?: AbortSignal;
}

function findStepReaching(plan: PipelinePlan, state: PipelineState): { stage: string; step: string | undefined } {
  for (const stage of plan.stages) {
    const step = stage.steps.find((s) => s.reaches === state);
    if (step) {
      return { stage: stage.name, step: step.id };
    }
  }
  return { stage: BUILDER_STAGE, step: undefined };
}

/**
 * Check the build context against the plan without running anything.
 *
 * @returns Every failure the backend would hit, attributed to its step.
 */
export function preflight(plan: PipelinePlan): StepFailure[] {
  const failures: StepFailure[] = [];
  const { manifests, config } = plan;

  if (!manifests.hasRequirements) {
    failures.push({
      ...findStepReaching(plan, PipelineState.DEPS_INSTALLED),
      message: `${config.requirements} not found in build context`,
    });
  }
  if (manifests.hasDescriptor && !manifests.hasLock) {
    failures.push({
      ...findStepReaching(plan, PipelineState.ENV_SYNCED),
      message: "pyproject.toml is present but uv.lock is missing (run `uv lock` and commit it)",
    });
  }
  return failures;
}

/** Tracks completed steps of one stage and advances states in graph order. */
class StageTracker {
  private readonly order: readonly BuildStep[];
  private completed = -1;
  private based = false;

  constructor(
    private readonly stage: ImageStage,
    private readonly machine: PipelineStateMachine
  ) {
    this.order = topologicalOrder(stage.steps);
  }

  get steps(): readonly BuildStep[] {
    return this.order;
  }

  position(stepId: string): number {
    return this.order.findIndex((step) => step.id === stepId);
  }

  /** Enter the stage's base state once its FROM line is in place. */
  base(): void {
    if (!this.based) {
      this.based = true;
      this.machine.advance(this.stage.baseState);
    }
  }

  /** Mark every step up to and including `index` complete. */
  completeThrough(index: number): void {
    this.base();
    while (this.completed < index) {
      this.completed += 1;
      const reaches = this.order[this.completed]?.reaches;
      if (reaches !== undefined) {
        this.machine.advance(reaches);
      }
    }
  }

  completeAll(): void {
    this.completeThrough(this.order.length - 1);
  }

  firstUnfinished(): string | undefined {
    return this.order[this.completed + 1]?.id;
  }
}

/**
 * Run a plan through a backend.
 *
 * A retry re-runs a stage from its first step; layer caching is left to the
 * backend.
 */
export async function runPipeline(
  plan: PipelinePlan,
  runner: StageRunner,
  options: RunPipelineOptions = {}
): Promise<PipelineResult> {
  const { observer } = options;
  const machine = new PipelineStateMachine((from, to) => observer?.onStateChange?.(from, to));
  const steps: StepOutcome[] = [];

  const fail = (failure: StepFailure): PipelineResult => {
    machine.fail();
    observer?.onFailure?.(failure);
    return { ok: false, failure, states: machine.history, steps };
  };

  if (options.preflight ?? true) {
    const [failure] = preflight(plan);
    if (failure) {
      return fail(failure);
    }
  }

  const total = plan.stages.length;
  for (const [index, stage] of plan.stages.entries()) {
    if (options.signal?.aborted) {
      return fail({ stage: stage.name, step: undefined, message: "Build cancelled" });
    }

    const tracker = new StageTracker(stage, machine);
    observer?.onStageStart?.(stage, index, total);

    const progress: StageProgress = {
      stepStarted: (stepId) => {
        const position = tracker.position(stepId);
        const step = tracker.steps[position];
        tracker.base();
        if (step) {
          observer?.onStepStart?.(stage, step, position + 1, tracker.steps.length);
        }
      },
      stepDone: (stepId, cached) => {
        const position = tracker.position(stepId);
        if (position < 0) {
          return;
        }
        tracker.completeThrough(position);
        const outcome = { stage: stage.name, step: stepId, cached };
        steps.push(outcome);
        observer?.onStepDone?.(stage, outcome);
      },
    };

    let result: StageResult;
    try {
      result = await runner.runStage(stage, plan, progress);
    } catch (e) {
      return fail({ stage: stage.name, step: tracker.firstUnfinished(), message: extractErrorDetails(e) });
    }

    if (!result.ok) {
      const failed = result.failure.step === undefined ? -1 : tracker.position(result.failure.step);
      if (failed >= 0) {
        tracker.completeThrough(failed - 1);
      }
      return fail(result.failure);
    }
    tracker.completeAll();
  }

  machine.advance(PipelineState.COMPLETED);
  return { ok: true, image: options.image, states: machine.history, steps };
}
