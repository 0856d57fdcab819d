/**
 * Pipeline planning: detect manifests, build both stages, order them.
 */

import type { PipelineConfig } from "../config.js";
import { computeManifestHash, detectManifests } from "../manifest.js";
import { orderStages } from "./graph.js";
import { createBuilderStage, createRuntimeStage } from "./stages.js";
import type { ImageStage, PipelinePlan } from "./types.js";

/**
 * Plan a build for a context directory.
 *
 * The plan is pure data: nothing is executed and no invariant is checked.
 * Use `checkPlan` / `assertPlan` before handing it to a runner.
 */
export function planPipeline(contextDir: string, config: PipelineConfig): PipelinePlan {
  const manifests = detectManifests(contextDir, config);
  const manifestHash = computeManifestHash(contextDir, manifests);

  const stages = orderStages([createBuilderStage(config, manifests), createRuntimeStage(config, manifestHash)]);

  return Object.freeze({
    stages: Object.freeze(stages),
    config,
    manifests,
    manifestHash,
  });
}

/** The stage that ships, if the plan has one. */
export function getShippedStage(plan: PipelinePlan): ImageStage | undefined {
  return plan.stages.find((stage) => stage.shipped);
}
