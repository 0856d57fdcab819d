/**
 * Pipeline model types for venvship.
 *
 * A pipeline is an ordered list of image stages. Each stage is an immutable
 * snapshot produced by running its steps against a base image. Stages hand
 * artifacts forward only through cross-stage copies.
 */

import type { PipelineConfig } from "../config.js";
import type { ManifestSet } from "../manifest.js";

/** States the pipeline moves through, in order, plus the terminals. */
export enum PipelineState {
  PENDING = "Pending",
  // Builder stage
  BASE_BUILDER = "BaseBuilder",
  DEPS_INSTALLED = "DepsInstalled",
  SOURCE_COPIED = "SourceCopied",
  ENV_SYNCED = "EnvSynced",
  // Runtime stage
  BASE_RUNTIME = "BaseRuntime",
  USER_CREATED = "UserCreated",
  OWNERSHIP_SET = "OwnershipSet",
  IDENTITY_SWITCHED = "IdentitySwitched",
  ARTIFACTS_COPIED = "ArtifactsCopied",
  PATH_CONFIGURED = "PathConfigured",
  SOURCE_RECOPIED = "SourceRecopied",
  // Terminals
  COMPLETED = "Completed",
  FAILED = "Failed",
}

/** Fields shared by every build step. */
interface StepBase {
  /** Unique within its stage. */
  readonly id: string;
  /** One-line description, rendered as a Dockerfile comment. */
  readonly description: string;
  /** Ids of steps in the same stage that must complete first. */
  readonly dependsOn: readonly string[];
  /** State entered once this step completes. */
  readonly reaches?: PipelineState;
}

export interface RunStep extends StepBase {
  readonly kind: "run";
  readonly command: string;
}

/** Fetch a remote file into the stage filesystem. */
export interface AddStep extends StepBase {
  readonly kind: "add";
  readonly source: string;
  readonly destination: string;
}

export interface CopyStep extends StepBase {
  readonly kind: "copy";
  /** Context paths or globs; a trailing `*` makes the source optional. */
  readonly sources: readonly string[];
  readonly destination: string;
  /** Source stage name for cross-stage copies. */
  readonly from?: string;
  /** `user:group` owner for copied files. */
  readonly chown?: string;
}

export interface EnvStep extends StepBase {
  readonly kind: "env";
  readonly vars: Readonly<Record<string, string>>;
}

/** Switch the identity that later steps and the final process run as. */
export interface UserStep extends StepBase {
  readonly kind: "user";
  readonly user: string;
}

export interface ExposeStep extends StepBase {
  readonly kind: "expose";
  readonly ports: readonly number[];
}

export interface LabelStep extends StepBase {
  readonly kind: "label";
  readonly labels: Readonly<Record<string, string>>;
}

export interface CmdStep extends StepBase {
  readonly kind: "cmd";
  readonly argv: readonly string[];
}

export type BuildStep = RunStep | AddStep | CopyStep | EnvStep | UserStep | ExposeStep | LabelStep | CmdStep;

export type StepKind = BuildStep["kind"];

/** Step kinds that change the filesystem (one BuildKit vertex each). */
export const FILESYSTEM_KINDS: ReadonlySet<StepKind> = new Set<StepKind>(["run", "add", "copy"]);

export function isFilesystemStep(step: BuildStep): step is RunStep | AddStep | CopyStep {
  return FILESYSTEM_KINDS.has(step.kind);
}

/** An independently based filesystem snapshot built from ordered steps. */
export interface ImageStage {
  readonly name: string;
  readonly baseImage: string;
  readonly workdir: string;
  readonly steps: readonly BuildStep[];
  /** Whether this stage is the image that ships. */
  readonly shipped: boolean;
  /** State entered once the base image and workdir are in place. */
  readonly baseState: PipelineState;
}

/** Everything needed to render, check and execute one build. */
export interface PipelinePlan {
  readonly stages: readonly ImageStage[];
  readonly config: PipelineConfig;
  readonly manifests: ManifestSet;
  readonly manifestHash: string;
}

/** Outcome of one step, as observed by a stage runner. */
export interface StepOutcome {
  readonly stage: string;
  readonly step: string;
  readonly cached: boolean;
}

/** Where and why the pipeline stopped. */
export interface StepFailure {
  readonly stage: string;
  /** Failing step id; absent when the failure could not be pinned to a step. */
  readonly step: string | undefined;
  readonly message: string;
  readonly exitCode?: number;
}

export type StageResult =
  | { readonly ok: true; readonly steps: readonly StepOutcome[] }
  | { readonly ok: false; readonly failure: StepFailure; readonly steps: readonly StepOutcome[] };

export type PipelineResult =
  | {
      readonly ok: true;
      readonly image: string | undefined;
      readonly states: readonly PipelineState[];
      readonly steps: readonly StepOutcome[];
    }
  | {
      readonly ok: false;
      readonly failure: StepFailure;
      readonly states: readonly PipelineState[];
      readonly steps: readonly StepOutcome[];
    };
