/**
 * Docker BuildKit backend for the pipeline orchestrator.
 *
 * Each stage is one `docker build --target <stage>` invocation; the
 * orchestrator calls them in sequence, so a later stage never sees a
 * partially built earlier one.
 */

import type { ProgressMode } from "../config.js";
import { DOCKER_BUILD_TIMEOUT } from "../constants.js";
import { log } from "../logger.js";
import type { StageProgress, StageRunner } from "../pipeline/orchestrator.js";
import { topologicalOrder } from "../pipeline/graph.js";
import { type ImageStage, isFilesystemStep, type PipelinePlan, type StageResult, type StepOutcome } from "../pipeline/types.js";
import { streamDockerRun } from "./executor.js";
import { ProgressTracker } from "./progress.js";

export interface DockerRunnerOptions {
  /** Build context directory. */
  contextDir: string;
  /** Path of the rendered Dockerfile (its .dockerignore sits beside it). */
  dockerfile: string;
  /** Tag applied to the shipped stage. */
  image: string;
  /**
   * How much raw BuildKit output to echo. docker always runs with plain
   * progress so steps can be tracked; `plain` echoes every line at info
   * level, `auto` and `tty` only at debug level.
   */
  progress?: ProgressMode;
  cache?: boolean;
  pull?: boolean;
  /** Per-stage timeout in ms; 0 disables it. */
  timeout?: number;
  signal?: AbortSignal;
}

/** Arguments for one stage build. */
export function buildStageArgs(stage: ImageStage, options: DockerRunnerOptions): string[] {
  const args = ["build", "--target", stage.name, "-f", options.dockerfile, "--progress=plain"];
  if (options.cache === false) {
    args.push("--no-cache");
  }
  if (options.pull) {
    args.push("--pull");
  }
  if (stage.shipped) {
    args.push("-t", options.image);
  }
  args.push(options.contextDir);
  return args;
}

export class DockerStageRunner implements StageRunner {
  constructor(private readonly options: DockerRunnerOptions) {}

  async runStage(stage: ImageStage, _plan: PipelinePlan, progress: StageProgress): Promise<StageResult> {
    const tracker = new ProgressTracker(stage);
    const outcomes: StepOutcome[] = [];
    const tail: string[] = [];

    const echo = this.options.progress === "plain" ? log.raw : log.debug;

    const onLine = (line: string): void => {
      echo(line);
      tail.push(line);
      if (tail.length > 20) {
        tail.shift();
      }

      const event = tracker.handle(line);
      if (!event) {
        return;
      }
      if (event.type === "start") {
        progress.stepStarted(event.step);
      } else if (event.type === "done") {
        outcomes.push({ stage: stage.name, step: event.step, cached: event.cached });
        progress.stepDone(event.step, event.cached);
      }
    };

    const { exitCode, cancelled } = await streamDockerRun(buildStageArgs(stage, this.options), onLine, {
      timeout: this.options.timeout ?? DOCKER_BUILD_TIMEOUT,
      signal: this.options.signal,
    });

    if (exitCode === 0) {
      return { ok: true, steps: outcomes };
    }

    const error = tracker.error;
    // Metadata steps produce no BuildKit vertex and never finish.
    const firstUnfinished = topologicalOrder(stage.steps).find(
      (step) => isFilesystemStep(step) && !tracker.isFinished(step.id)
    )?.id;
    const message = cancelled
      ? "Build cancelled"
      : (error?.message ?? (tail.filter((line) => /error/i.test(line)).pop() || `docker build exited with ${exitCode}`));

    return {
      ok: false,
      failure: {
        stage: stage.name,
        step: error?.step ?? firstUnfinished,
        message,
        exitCode: error?.exitCode ?? exitCode,
      },
      steps: outcomes,
    };
  }
}
