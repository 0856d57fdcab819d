/**
 * Dockerfile rendering for venvship.
 *
 * The Dockerfile is a rendering of the plan, never a source of truth:
 * stages in graph order, steps in topological order, each preceded by its
 * description as a comment.
 */

import type { PipelineConfig } from "./config.js";
import { CONTEXT_EXCLUDES } from "./constants.js";
import { topologicalOrder } from "./pipeline/graph.js";
import { type BuildStep, type ImageStage, isFilesystemStep, type PipelinePlan } from "./pipeline/types.js";

const SYNTAX_HEADER = "# syntax=docker/dockerfile:1";

/** Quote an ENV/LABEL value when it contains whitespace, quotes or backslashes. */
function quoteValue(value: string): string {
  if (value !== "" && !/[\s"'\\]/.test(value)) {
    return value;
  }
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}

/** Split `a && b && c` over continuation lines. */
function formatShell(command: string): string {
  return command.split(" && ").join(" \\\n    && ");
}

function formatPairs(vars: Readonly<Record<string, string>>, quoteAll: boolean): string {
  return Object.entries(vars)
    .map(([key, value]) => `${key}=${quoteAll ? `"${value.replace(/(["\\])/g, "\\$1")}"` : quoteValue(value)}`)
    .join(" \\\n    ");
}

/** The Dockerfile instruction for one step, without its comment. */
export function renderInstruction(step: BuildStep): string {
  switch (step.kind) {
    case "run":
      return `RUN ${formatShell(step.command)}`;
    case "add":
      return `ADD ${step.source} ${step.destination}`;
    case "copy": {
      const flags = [
        step.from !== undefined ? `--from=${step.from}` : "",
        step.chown !== undefined ? `--chown=${step.chown}` : "",
      ].filter(Boolean);
      return ["COPY", ...flags, ...step.sources, step.destination].join(" ");
    }
    case "env":
      return `ENV ${formatPairs(step.vars, false)}`;
    case "user":
      return `USER ${step.user}`;
    case "expose":
      return `EXPOSE ${step.ports.join(" ")}`;
    case "label":
      return `LABEL ${formatPairs(step.labels, true)}`;
    case "cmd":
      return `CMD ${JSON.stringify(step.argv)}`;
  }
}

function renderStage(stage: ImageStage): string {
  const lines = [`FROM ${stage.baseImage} AS ${stage.name}`, `WORKDIR ${stage.workdir}`];
  for (const step of topologicalOrder(stage.steps)) {
    lines.push("", `# ${step.description}`, renderInstruction(step));
  }
  return lines.join("\n");
}

/** Render the full multi-stage Dockerfile for a plan. */
export function renderDockerfile(plan: PipelinePlan): string {
  const parts = [SYNTAX_HEADER, ...plan.stages.map(renderStage)];
  return `${parts.join("\n\n")}\n`;
}

/**
 * Render the build context exclusions.
 *
 * Written as `Dockerfile.dockerignore` beside the Dockerfile, where BuildKit
 * prefers it over a `.dockerignore` in the context.
 */
export function renderDockerignore(config: PipelineConfig): string {
  return `${dockerignorePatterns(config).join("\n")}\n`;
}

/** Exclusion patterns applied to the build context. */
export function dockerignorePatterns(config: PipelineConfig): string[] {
  return [config.venvDir, ...CONTEXT_EXCLUDES];
}

/**
 * BuildKit vertex positions of a stage's filesystem steps.
 *
 * Positions are 1-based as shown in `[stage i/n]`: FROM is 1, WORKDIR is 2,
 * then one per RUN/ADD/COPY in topological order.
 */
export function vertexMap(stage: ImageStage): Map<number, string> {
  const map = new Map<number, string>();
  let position = 2;
  for (const step of topologicalOrder(stage.steps)) {
    if (isFilesystemStep(step)) {
      position += 1;
      map.set(position, step.id);
    }
  }
  return map;
}
