/**
 * `venvship check`: invariants plus preflight, without building.
 */

import { log } from "../logger.js";
import { checkRequirementPins } from "../manifest.js";
import { checkPlan, formatIssue, type PlanIssue } from "../pipeline/invariants.js";
import { preflight } from "../pipeline/orchestrator.js";
import { planPipeline } from "../pipeline/plan.js";
import type { ProjectContext } from "./context.js";

/** Every finding for a project: invariant issues, then preflight failures. */
export function collectIssues(ctx: ProjectContext): PlanIssue[] {
  const plan = planPipeline(ctx.projectPath, ctx.config);
  const preflightIssues = preflight(plan).map(
    (failure): PlanIssue => ({
      severity: "error",
      code: "PREFLIGHT",
      stage: failure.stage,
      step: failure.step,
      message: failure.message,
    })
  );
  return [...checkPlan(plan), ...preflightIssues];
}

/** @returns 1 when any error-level issue was found. */
export function check(ctx: ProjectContext): number {
  const issues = collectIssues(ctx);
  const unpinned = checkRequirementPins(ctx.projectPath, ctx.config);

  for (const issue of issues) {
    if (issue.severity === "error") {
      log.error(formatIssue(issue));
    } else {
      log.warn(formatIssue(issue));
    }
  }
  for (const line of unpinned) {
    log.warn(`UNPINNED_REQUIREMENT: '${line}' does not pin an exact version`);
  }

  const errors = issues.filter((issue) => issue.severity === "error").length;
  if (errors > 0) {
    log.error(`${errors} error(s) found`);
    return 1;
  }
  log.success(issues.length + unpinned.length === 0 ? "No issues found" : "No errors found");
  return 0;
}
