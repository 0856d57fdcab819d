/**
 * Layer cache keys.
 *
 * A model of how the backend reuses layers: each step's key chains the
 * previous key, the rendered instruction, and the digest of the context
 * files the step copies. Equal keys mean the cached layer is reused.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { join } from "node:path";

import { dockerignorePatterns, renderInstruction } from "../dockerfile-gen.js";
import { globToRegExp, listContextFiles, matchesAny } from "../paths.js";
import { topologicalOrder } from "./graph.js";
import type { BuildStep, ImageStage, PipelinePlan } from "./types.js";

export interface LayerKey {
  readonly step: string;
  readonly key: string;
}

function sha256(text: string | Buffer): string {
  return createHash("sha256").update(text).digest("hex");
}

/** Digest of the context files a copy step's sources select. */
function digestSources(contextDir: string, files: readonly string[], sources: readonly string[]): string {
  const patterns = sources.map(globToRegExp);
  const hash = createHash("sha256");
  for (const file of files) {
    if (matchesAny(file, patterns)) {
      hash.update(`${file}\n`);
      hash.update(sha256(readFileSync(join(contextDir, file))));
      hash.update("\n");
    }
  }
  return hash.digest("hex");
}

function contentOf(
  step: BuildStep,
  contextDir: string,
  files: readonly string[],
  upstream: ReadonlyMap<string, string>
): string {
  if (step.kind !== "copy") {
    return "";
  }
  if (step.from !== undefined) {
    return upstream.get(step.from) ?? "";
  }
  return digestSources(contextDir, files, step.sources);
}

/**
 * One chained key per step, in topological order.
 *
 * @param ignore - Context exclusion patterns (as in the dockerignore file).
 * @param upstream - Final key of each earlier stage, for cross-stage copies.
 */
export function computeLayerKeys(
  stage: ImageStage,
  contextDir: string,
  ignore: readonly string[],
  upstream: ReadonlyMap<string, string> = new Map()
): LayerKey[] {
  const files = listContextFiles(contextDir, ignore);
  let previous = sha256(`FROM ${stage.baseImage}\nWORKDIR ${stage.workdir}`);

  return topologicalOrder(stage.steps).map((step) => {
    const key = sha256(`${previous}\n${renderInstruction(step)}\n${contentOf(step, contextDir, files, upstream)}`);
    previous = key;
    return { step: step.id, key };
  });
}

/** Layer keys for every stage of a plan, keyed by stage name. */
export function computePlanLayerKeys(plan: PipelinePlan, contextDir: string): Map<string, LayerKey[]> {
  const ignore = dockerignorePatterns(plan.config);
  const finals = new Map<string, string>();
  const result = new Map<string, LayerKey[]>();

  for (const stage of plan.stages) {
    const keys = computeLayerKeys(stage, contextDir, ignore, finals);
    result.set(stage.name, keys);
    const last = keys.at(-1);
    if (last) {
      finals.set(stage.name, last.key);
    }
  }
  return result;
}
