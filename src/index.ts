/**
 * venvship - two-stage, non-root container images for Python services.
 *
 * This is the main entry point for the venvship npm package.
 */

// Re-export main types and functions
export { VERSION } from "./constants.js";
export {
  createPipelineConfig,
  getImageName,
  type PipelineConfig,
  type PipelineConfigInput,
  type RuntimeIdentity,
} from "./config.js";
export { loadVenvshipConfig, type VenvshipFileConfig } from "./config-file.js";
export {
  VenvshipError,
  ConfigError,
  ValidationError,
  ManifestError,
  PipelineStateError,
  DockerError,
  ImageBuildError,
  PathError,
} from "./errors.js";
export { detectManifests, computeManifestHash, findUnpinnedRequirements, type ManifestSet } from "./manifest.js";
export * from "./pipeline/types.js";
export { topologicalOrder, hasUniqueOrder, orderStages } from "./pipeline/graph.js";
export { createBuilderStage, createRuntimeStage } from "./pipeline/stages.js";
export { planPipeline } from "./pipeline/plan.js";
export { checkPlan, assertPlan, type PlanIssue } from "./pipeline/invariants.js";
export { PipelineStateMachine, TRANSITIONS } from "./pipeline/state-machine.js";
export {
  runPipeline,
  preflight,
  type StageRunner,
  type StageProgress,
  type PipelineObserver,
} from "./pipeline/orchestrator.js";
export { computeLayerKeys, computePlanLayerKeys, type LayerKey } from "./pipeline/layer-keys.js";
export { renderDockerfile, renderDockerignore, vertexMap } from "./dockerfile-gen.js";
export { DockerStageRunner } from "./docker/runner.js";
export { verifyImage, captureFreeze, compareFreeze, type VerificationReport } from "./docker/inspect.js";
export { buildServiceImage, type BuildOptions } from "./build.js";
