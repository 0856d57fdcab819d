/**
 * Build operations for venvship.
 *
 * Plans, checks, renders and runs the two-stage pipeline for a project,
 * then optionally verifies the shipped image.
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import type { PipelineConfig, ProgressMode } from "./config.js";
import { getVenvshipTempBuild, RUNTIME_STAGE } from "./constants.js";
import { removeImage } from "./docker/executor.js";
import { verifyImage, type VerificationReport } from "./docker/inspect.js";
import { DockerStageRunner } from "./docker/runner.js";
import { renderDockerfile, renderDockerignore } from "./dockerfile-gen.js";
import { logExitCode } from "./error-handler.js";
import { ImageBuildError } from "./errors.js";
import { log, style } from "./logger.js";
import { checkRequirementPins } from "./manifest.js";
import { assertPlan, formatIssue } from "./pipeline/invariants.js";
import { type PipelineObserver, runPipeline, type StageRunner } from "./pipeline/orchestrator.js";
import { planPipeline } from "./pipeline/plan.js";
import type { PipelinePlan } from "./pipeline/types.js";
import { validateProjectPath } from "./paths.js";

/** Build options for the image pipeline. */
export interface BuildOptions {
  /** Image name with tag. */
  image: string;
  /** How much BuildKit output to echo (default: auto). */
  progress?: ProgressMode;
  /** Use the Docker build cache (default: true). */
  cache?: boolean;
  /** Always pull newer base images. */
  pull?: boolean;
  /** Check the build context before invoking docker (default: true). */
  preflight?: boolean;
  /** Verify the runtime contract on the built image. */
  verify?: boolean;
  /** Per-stage timeout in ms; 0 disables it. */
  timeout?: number;
  signal?: AbortSignal;
  /** Execution backend (default: docker). */
  runner?: StageRunner;
  observer?: PipelineObserver;
}

/** Observer that logs each step as `[stage i/n] step-id: description`. */
export function createLogObserver(): PipelineObserver {
  return {
    onStageStart: (stage, index, total) => {
      log.bold(`Stage ${index + 1}/${total}: ${stage.name} (${stage.baseImage})`);
    },
    onStepStart: (stage, step, position, total) => {
      log.info(`[${stage.name} ${position}/${total}] ${step.id}: ${step.description}`);
    },
    onStepDone: (_stage, outcome) => {
      if (outcome.cached) {
        log.dim(`  ${outcome.step} ${style.dim("(cached)")}`);
      }
    },
    onStateChange: (from, to) => {
      log.debug(`state: ${from} -> ${to}`);
    },
  };
}

/** Temp build directory for an image. */
export function getBuildDir(image: string): string {
  return getVenvshipTempBuild(image.replace(/[^a-z0-9_.-]/g, "-"));
}

/**
 * Write the Dockerfile and its ignore file.
 *
 * @returns Path of the written Dockerfile.
 */
export function writeBuildFiles(plan: PipelinePlan, buildDir: string): string {
  mkdirSync(buildDir, { recursive: true });
  const dockerfile = join(buildDir, "Dockerfile");
  writeFileSync(dockerfile, renderDockerfile(plan), { encoding: "utf-8" });
  writeFileSync(`${dockerfile}.dockerignore`, renderDockerignore(plan.config), { encoding: "utf-8" });
  return dockerfile;
}

/** Plan and check a project, logging warnings. Errors abort. */
export function preparePlan(projectPath: string, config: PipelineConfig): PipelinePlan {
  const plan = planPipeline(projectPath, config);
  for (const warning of assertPlan(plan)) {
    log.warn(`Warning: ${formatIssue(warning)}`);
  }
  for (const line of checkRequirementPins(projectPath, config)) {
    log.warn(`Warning: unpinned requirement '${line}' (builds may not be reproducible)`);
  }
  return plan;
}

function describeFailedChecks(report: VerificationReport): string {
  return report.checks
    .filter((check) => !check.ok)
    .map((check) => `${check.name} (expected ${check.expected}, got ${check.actual || "nothing"})`)
    .join(", ");
}

/**
 * Build the service image for a project.
 *
 * @returns The built image name.
 * @throws ImageBuildError naming the failing stage and step.
 */
export async function buildServiceImage(
  projectPath: string,
  config: PipelineConfig,
  options: BuildOptions
): Promise<string> {
  const contextDir = validateProjectPath(projectPath);
  const plan = preparePlan(contextDir, config);
  const { image } = options;

  const buildDir = getBuildDir(image);
  try {
    const dockerfile = writeBuildFiles(plan, buildDir);
    log.debug(`Dockerfile: ${dockerfile}`);

    const runner =
      options.runner ??
      new DockerStageRunner({
        contextDir,
        dockerfile,
        image,
        progress: options.progress,
        cache: options.cache,
        pull: options.pull,
        timeout: options.timeout,
        signal: options.signal,
      });

    log.bold(`Building ${image}...`);
    const result = await runPipeline(plan, runner, {
      preflight: options.preflight,
      observer: options.observer ?? createLogObserver(),
      image,
      signal: options.signal,
    });

    if (!result.ok) {
      const { stage, step, message, exitCode } = result.failure;
      const where = step ? `${stage}/${step}` : stage;
      if (exitCode !== undefined) {
        logExitCode(exitCode, where);
      }
      throw new ImageBuildError(`Build failed at ${where}: ${message}`, { stage, step });
    }
    log.success(`Built ${image}`);

    if (options.verify) {
      const report = await verifyImage(image, config);
      if (!report.ok) {
        // No non-compliant image stays tagged
        await removeImage(image, true);
        throw new ImageBuildError(`Image failed runtime verification: ${describeFailedChecks(report)}`, {
          stage: RUNTIME_STAGE,
        });
      }
      log.success("Runtime contract verified");
    }

    return image;
  } finally {
    try {
      rmSync(buildDir, { recursive: true, force: true });
    } catch (e) {
      log.debug(`Cleanup error: ${String(e)}`);
    }
  }
}
