/**
 * `venvship plan`: show stages, steps, reached states and layer keys.
 */

import { preparePlan } from "../build.js";
import { renderInstruction } from "../dockerfile-gen.js";
import { log, style } from "../logger.js";
import { topologicalOrder } from "../pipeline/graph.js";
import { computePlanLayerKeys, type LayerKey } from "../pipeline/layer-keys.js";
import type { PipelinePlan } from "../pipeline/types.js";
import type { ProjectContext } from "./context.js";

const KEY_LENGTH = 12;

/** First line of an instruction, for one-line listings. */
function summarize(instruction: string): string {
  const [first = ""] = instruction.split("\n");
  return first.replace(/\s*\\$/, "");
}

/** Plan listing lines (no styling). */
export function formatPlan(plan: PipelinePlan, keys: ReadonlyMap<string, readonly LayerKey[]>): string[] {
  const lines: string[] = [`manifest-hash ${plan.manifestHash}`];

  plan.stages.forEach((stage, index) => {
    const stageKeys = new Map((keys.get(stage.name) ?? []).map((k) => [k.step, k.key]));
    lines.push("");
    lines.push(`${index + 1}. ${stage.name} FROM ${stage.baseImage}${stage.shipped ? " (shipped)" : ""} -> ${stage.baseState}`);

    topologicalOrder(stage.steps).forEach((step, i) => {
      const key = (stageKeys.get(step.id) ?? "").slice(0, KEY_LENGTH);
      const reaches = step.reaches ? ` -> ${step.reaches}` : "";
      lines.push(`   ${String(i + 1).padStart(2)}. ${step.id}${reaches} [${key}]`);
      lines.push(`       ${summarize(renderInstruction(step))}`);
    });
  });
  return lines;
}

export function plan(ctx: ProjectContext): number {
  const pipelinePlan = preparePlan(ctx.projectPath, ctx.config);
  const keys = computePlanLayerKeys(pipelinePlan, ctx.projectPath);

  log.bold(`Plan for ${ctx.projectPath}`);
  for (const line of formatPlan(pipelinePlan, keys)) {
    log.raw(line.startsWith("       ") ? style.dim(line) : line);
  }
  return 0;
}
