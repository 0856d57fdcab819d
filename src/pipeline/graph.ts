/**
 * Dependency graphs for steps and stages.
 *
 * Steps declare their ordering constraints as edges (dependsOn). The stage
 * order comes from cross-stage copies: a stage that copies from another
 * runs after it.
 */

import { ValidationError } from "../errors.js";
import type { BuildStep, ImageStage } from "./types.js";

interface GraphNode {
  readonly id: string;
  readonly dependsOn: readonly string[];
}

interface KahnResult {
  order: string[];
  /** Largest number of simultaneously ready nodes seen. */
  maxReady: number;
}

/**
 * Kahn's algorithm. Ties are broken by declaration order.
 *
 * @throws ValidationError on duplicate ids, unknown dependencies or cycles.
 */
function kahn(nodes: readonly GraphNode[], what: string): KahnResult {
  const index = new Map<string, number>();
  nodes.forEach((node, i) => {
    if (index.has(node.id)) {
      throw new ValidationError(`Duplicate ${what} id '${node.id}'`);
    }
    index.set(node.id, i);
  });

  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    indegree.set(node.id, 0);
    dependents.set(node.id, []);
  }
  for (const node of nodes) {
    for (const dep of new Set(node.dependsOn)) {
      if (!index.has(dep)) {
        throw new ValidationError(`${what} '${node.id}' depends on unknown ${what} '${dep}'`);
      }
      if (dep === node.id) {
        throw new ValidationError(`${what} '${node.id}' depends on itself`);
      }
      indegree.set(node.id, (indegree.get(node.id) ?? 0) + 1);
      dependents.get(dep)?.push(node.id);
    }
  }

  const byDeclaration = (a: string, b: string) => (index.get(a) ?? 0) - (index.get(b) ?? 0);
  let ready = nodes.filter((n) => indegree.get(n.id) === 0).map((n) => n.id);
  const order: string[] = [];
  let maxReady = ready.length;

  while (ready.length > 0) {
    ready.sort(byDeclaration);
    const [next, ...rest] = ready;
    if (next === undefined) {break;}
    order.push(next);
    ready = rest;
    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
      }
    }
    maxReady = Math.max(maxReady, ready.length);
  }

  if (order.length !== nodes.length) {
    const stuck = nodes.filter((n) => !order.includes(n.id)).map((n) => n.id);
    throw new ValidationError(`Cycle between ${what}s: ${stuck.join(", ")}`);
  }

  return { order, maxReady };
}

/**
 * Steps in dependency order.
 *
 * @throws ValidationError on duplicate ids, unknown dependencies or cycles.
 */
export function topologicalOrder(steps: readonly BuildStep[]): BuildStep[] {
  const { order } = kahn(steps, "step");
  const byId = new Map(steps.map((s) => [s.id, s]));
  return order.flatMap((id) => {
    const step = byId.get(id);
    return step ? [step] : [];
  });
}

/**
 * True when the step graph admits exactly one valid order.
 *
 * That holds when every round of Kahn's algorithm has a single ready step.
 */
export function hasUniqueOrder(steps: readonly BuildStep[]): boolean {
  if (steps.length === 0) {
    return true;
  }
  return kahn(steps, "step").maxReady <= 1;
}

/** Stage names a stage copies from. */
export function stageDependencies(stage: ImageStage): string[] {
  const deps = new Set<string>();
  for (const step of stage.steps) {
    if (step.kind === "copy" && step.from !== undefined) {
      deps.add(step.from);
    }
  }
  return [...deps];
}

/**
 * Stages in execution order, derived from cross-stage copies.
 *
 * @throws ValidationError on copies from unknown stages, self-copies or cycles.
 */
export function orderStages(stages: readonly ImageStage[]): ImageStage[] {
  const nodes = stages.map((stage) => ({ id: stage.name, dependsOn: stageDependencies(stage) }));
  const { order } = kahn(nodes, "stage");
  const byName = new Map(stages.map((s) => [s.name, s]));
  return order.flatMap((name) => {
    const stage = byName.get(name);
    return stage ? [stage] : [];
  });
}
