/**
 * Build invariants checked against a plan before anything runs.
 *
 * Ordering invariants are checked on the declared graph edges, not on list
 * order: a step that merely appears later may still be scheduled earlier.
 */

import { getNumericIdentity, getOwner, getVenvBinPath } from "../config.js";
import { BUILDER_STAGE } from "../constants.js";
import { ValidationError } from "../errors.js";
import { MAX_PORT, MIN_UNPRIVILEGED_PORT } from "../validation.js";
import { hasUniqueOrder, stageDependencies, topologicalOrder } from "./graph.js";
import { getShippedStage } from "./plan.js";
import { type BuildStep, type ImageStage, type PipelinePlan, PipelineState } from "./types.js";

export type IssueSeverity = "error" | "warn";

export type IssueCode =
  | "UNIQUE_ORDER"
  | "MANIFEST_BEFORE_SOURCE"
  | "INSTALLER_CLEANUP"
  | "TOOLS_BEFORE_INSTALL"
  | "PRIVILEGED_IDENTITY"
  | "IDENTITY_REESCALATION"
  | "IDENTITY_SWITCH_MISSING"
  | "UNOWNED_COPY"
  | "PATH_PREPEND"
  | "BASE_IMAGE_REUSED"
  | "PYTHON_VERSION_SKEW"
  | "PRIVILEGED_PORT"
  | "SHIPPED_BUILDER"
  | "PREFLIGHT";

export interface PlanIssue {
  readonly severity: IssueSeverity;
  readonly code: IssueCode;
  readonly stage: string;
  readonly step?: string;
  readonly message: string;
}

/** Steps in graph order; declaration order when the graph is invalid (reported separately). */
function orderedSteps(stage: ImageStage): readonly BuildStep[] {
  try {
    return topologicalOrder(stage.steps);
  } catch (e) {
    if (e instanceof ValidationError) {
      return stage.steps;
    }
    throw e;
  }
}

/** Ids of every step `id` depends on, directly or transitively. */
function ancestors(steps: readonly BuildStep[], id: string): Set<string> {
  const byId = new Map(steps.map((s) => [s.id, s]));
  const seen = new Set<string>();
  const stack = [...(byId.get(id)?.dependsOn ?? [])];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) {continue;}
    seen.add(next);
    stack.push(...(byId.get(next)?.dependsOn ?? []));
  }
  return seen;
}

function dependsOn(steps: readonly BuildStep[], later: string, earlier: string): boolean {
  return ancestors(steps, later).has(earlier);
}

function findReaching(stage: ImageStage, state: PipelineState): BuildStep | undefined {
  return stage.steps.find((step) => step.reaches === state);
}

/** `root`, uid 0 or gid 0 in a USER spec (`name`, `uid`, `uid:gid`). */
export function isPrivilegedUserSpec(spec: string): boolean {
  return spec.split(":").some((part) => part === "root" || part === "0");
}

/** Python minor version from an image tag such as `python:3.12-slim`. */
export function pythonVersionOf(image: string): string | undefined {
  const tag = image.split("@")[0]?.split("/").pop()?.split(":")[1];
  return tag?.match(/^(\d+\.\d+)/)?.[1];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type Check = (plan: PipelinePlan) => PlanIssue[];

const checkUniqueOrder: Check = (plan) =>
  plan.stages.flatMap((stage): PlanIssue[] => {
    try {
      if (hasUniqueOrder(stage.steps)) {
        return [];
      }
      return [{
        severity: "error",
        code: "UNIQUE_ORDER",
        stage: stage.name,
        message: "step graph admits more than one execution order",
      }];
    } catch (e) {
      if (!(e instanceof ValidationError)) {throw e;}
      return [{ severity: "error", code: "UNIQUE_ORDER", stage: stage.name, message: e.message }];
    }
  });

const checkManifestBeforeSource: Check = (plan) => {
  const issues: PlanIssue[] = [];
  const requirements = plan.config.requirements;

  for (const stage of plan.stages) {
    const install = findReaching(stage, PipelineState.DEPS_INSTALLED);
    if (!install) {continue;}

    const issue = (message: string, step?: string): PlanIssue => ({
      severity: "error", code: "MANIFEST_BEFORE_SOURCE", stage: stage.name, step, message,
    });

    const manifestCopy = stage.steps.find(
      (step) =>
        step.kind === "copy" &&
        step.from === undefined &&
        step.sources.some((src) => src === requirements || src === `${requirements}*`)
    );
    if (!manifestCopy) {
      issues.push(issue(`no step copies ${requirements} before the install`, install.id));
    } else if (!dependsOn(stage.steps, install.id, manifestCopy.id)) {
      issues.push(issue(`'${install.id}' does not depend on manifest copy '${manifestCopy.id}'`, install.id));
    }

    const sourceCopy = findReaching(stage, PipelineState.SOURCE_COPIED);
    if (sourceCopy && !dependsOn(stage.steps, sourceCopy.id, install.id)) {
      issues.push(issue(`source copy '${sourceCopy.id}' does not depend on '${install.id}'`, sourceCopy.id));
    }
  }
  return issues;
};

const checkInstallerCleanup: Check = (plan) => {
  const issues: PlanIssue[] = [];
  for (const stage of plan.stages) {
    for (const add of stage.steps) {
      if (add.kind !== "add" || !/^https?:\/\//.test(add.source)) {continue;}

      const dest = escapeRegExp(add.destination);
      const cleaned = stage.steps.some(
        (step) =>
          step.kind === "run" &&
          dependsOn(stage.steps, step.id, add.id) &&
          new RegExp(`\\brm\\s+(-f\\s+)?${dest}(\\s|$)`).test(step.command) &&
          (step.command.match(new RegExp(dest, "g")) ?? []).length >= 2
      );
      if (!cleaned) {
        issues.push({
          severity: "error",
          code: "INSTALLER_CLEANUP",
          stage: stage.name,
          step: add.id,
          message: `${add.destination} is not executed and removed in a single later step`,
        });
      }
    }
  }
  return issues;
};

const checkToolsBeforeInstall: Check = (plan) => {
  const issues: PlanIssue[] = [];
  for (const stage of plan.stages) {
    const install = findReaching(stage, PipelineState.DEPS_INSTALLED);
    if (!install) {continue;}
    const upgrade = stage.steps.find(
      (step) => step.kind === "run" && /\bpip install (--upgrade|-U)\b/.test(step.command)
    );
    if (!upgrade || !dependsOn(stage.steps, install.id, upgrade.id)) {
      issues.push({
        severity: "error",
        code: "TOOLS_BEFORE_INSTALL",
        stage: stage.name,
        step: install.id,
        message: "packaging tools are not upgraded before the dependency install",
      });
    }
  }
  return issues;
};

const checkPrivilegedIdentity: Check = (plan) => {
  const { identity } = plan.config;
  const problems: string[] = [];
  if (identity.uid === 0) {problems.push("uid is 0");}
  if (identity.gid === 0) {problems.push("gid is 0");}
  if (identity.user === "root") {problems.push("user is root");}
  if (identity.group === "root") {problems.push("group is root");}

  const shipped = getShippedStage(plan);
  return problems.map((problem): PlanIssue => ({
    severity: "error",
    code: "PRIVILEGED_IDENTITY",
    stage: shipped?.name ?? "",
    message: `runtime identity is privileged: ${problem}`,
  }));
};

const checkIdentitySteps: Check = (plan) => {
  const issues: PlanIssue[] = [];
  for (const stage of plan.stages) {
    const users = orderedSteps(stage).filter((step) => step.kind === "user");

    users.slice(1).forEach((step) => {
      if (step.kind === "user" && isPrivilegedUserSpec(step.user)) {
        issues.push({
          severity: "error",
          code: "IDENTITY_REESCALATION",
          stage: stage.name,
          step: step.id,
          message: `switches back to privileged identity '${step.user}'`,
        });
      }
    });

    if (stage.shipped) {
      const last = users.at(-1);
      if (!last || last.kind !== "user" || isPrivilegedUserSpec(last.user)) {
        issues.push({
          severity: "error",
          code: "IDENTITY_SWITCH_MISSING",
          stage: stage.name,
          message: `shipped stage never switches to ${getNumericIdentity(plan.config.identity)}`,
        });
      }
    }
  }
  return issues;
};

const checkUnownedCopy: Check = (plan) => {
  const owner = getOwner(plan.config.identity);
  const issues: PlanIssue[] = [];
  for (const stage of plan.stages) {
    let switched = false;
    for (const step of orderedSteps(stage)) {
      if (step.kind === "user") {
        switched = !isPrivilegedUserSpec(step.user);
        continue;
      }
      if (switched && step.kind === "copy" && step.chown !== owner) {
        issues.push({
          severity: "error",
          code: "UNOWNED_COPY",
          stage: stage.name,
          step: step.id,
          message: `copy after the identity switch is not owned by ${owner}`,
        });
      }
    }
  }
  return issues;
};

const checkPathPrepend: Check = (plan) => {
  const venvBin = getVenvBinPath(plan.config);
  const issues: PlanIssue[] = [];
  for (const stage of plan.stages.filter((s) => s.shipped)) {
    const pathSteps = orderedSteps(stage).filter(
      (step) => step.kind === "env" && step.vars.PATH !== undefined
    );
    const last = pathSteps.at(-1);
    const path = last?.kind === "env" ? last.vars.PATH : undefined;
    if (path === undefined || !path.startsWith(`${venvBin}:`)) {
      issues.push({
        severity: "error",
        code: "PATH_PREPEND",
        stage: stage.name,
        step: last?.id,
        message: `PATH must start with ${venvBin}`,
      });
    }
  }
  return issues;
};

const checkBaseImages: Check = (plan) => {
  const issues: PlanIssue[] = [];
  plan.stages.forEach((stage, i) => {
    for (const other of plan.stages.slice(0, i)) {
      if (other.baseImage === stage.baseImage) {
        issues.push({
          severity: "error",
          code: "BASE_IMAGE_REUSED",
          stage: stage.name,
          message: `base image ${stage.baseImage} is also the base of '${other.name}'`,
        });
      }
      const a = pythonVersionOf(other.baseImage);
      const b = pythonVersionOf(stage.baseImage);
      if (a !== undefined && b !== undefined && a !== b) {
        issues.push({
          severity: "warn",
          code: "PYTHON_VERSION_SKEW",
          stage: stage.name,
          message: `Python ${b} differs from Python ${a} in '${other.name}'; copied venv interpreter links may break`,
        });
      }
    }
  });
  return issues;
};

const checkPorts: Check = (plan) =>
  plan.stages.flatMap((stage) =>
    stage.steps.flatMap((step): PlanIssue[] => {
      if (step.kind !== "expose") {return [];}
      return step.ports
        .filter((port) => !Number.isInteger(port) || port < MIN_UNPRIVILEGED_PORT || port > MAX_PORT)
        .map((port): PlanIssue => ({
          severity: "error",
          code: "PRIVILEGED_PORT",
          stage: stage.name,
          step: step.id,
          message: `port ${port} is outside ${MIN_UNPRIVILEGED_PORT}-${MAX_PORT}`,
        }));
    })
  );

const checkShippedBuilder: Check = (plan) => {
  const copiedFrom = new Set(plan.stages.flatMap((stage) => stageDependencies(stage)));
  return plan.stages
    .filter((stage) => stage.shipped && (stage.name === BUILDER_STAGE || copiedFrom.has(stage.name)))
    .map((stage): PlanIssue => ({
      severity: "error",
      code: "SHIPPED_BUILDER",
      stage: stage.name,
      message: "build-only stage is marked as shipped",
    }));
};

const CHECKS: readonly Check[] = [
  checkUniqueOrder,
  checkManifestBeforeSource,
  checkInstallerCleanup,
  checkToolsBeforeInstall,
  checkPrivilegedIdentity,
  checkIdentitySteps,
  checkUnownedCopy,
  checkPathPrepend,
  checkBaseImages,
  checkPorts,
  checkShippedBuilder,
];

/** Run every invariant check. Issues are returned in check order. */
export function checkPlan(plan: PipelinePlan): PlanIssue[] {
  return CHECKS.flatMap((check) => check(plan));
}

export function formatIssue(issue: PlanIssue): string {
  const where = issue.step ? `${issue.stage}/${issue.step}` : issue.stage;
  return `${issue.code} (${where}): ${issue.message}`;
}

/**
 * Throw if the plan breaks any error-level invariant.
 *
 * @returns Warning-level issues, for the caller to log.
 */
export function assertPlan(plan: PipelinePlan): PlanIssue[] {
  const issues = checkPlan(plan);
  const errors = issues.filter((issue) => issue.severity === "error");
  if (errors.length > 0) {
    throw new ValidationError(
      `Plan breaks ${errors.length} build invariant(s):\n` + errors.map((e) => `  - ${formatIssue(e)}`).join("\n")
    );
  }
  return issues.filter((issue) => issue.severity === "warn");
}
