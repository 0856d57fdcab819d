import { describe, expect, it } from "vitest";

import { ValidationError } from "../../src/errors.js";
import { hasUniqueOrder, orderStages, stageDependencies, topologicalOrder } from "../../src/pipeline/graph.js";
import { type BuildStep, type ImageStage, PipelineState } from "../../src/pipeline/types.js";

function run(id: string, dependsOn: string[] = []): BuildStep {
  return { id, kind: "run", description: id, dependsOn, command: `echo ${id}` };
}

function stage(name: string, copiesFrom: string[] = []): ImageStage {
  return {
    name,
    baseImage: "python:3.12-slim",
    workdir: "/app",
    shipped: false,
    baseState: PipelineState.BASE_BUILDER,
    steps: copiesFrom.map((from, i) => ({
      id: `copy-${i}`,
      kind: "copy",
      description: "copy",
      dependsOn: [],
      from,
      sources: ["/app"],
      destination: "/app",
    })),
  };
}

describe("topologicalOrder", () => {
  it("should follow dependencies rather than declaration order", () => {
    const order = topologicalOrder([run("c", ["b"]), run("a"), run("b", ["a"])]);
    expect(order.map((s) => s.id)).toEqual(["a", "b", "c"]);
  });

  it("should break ties by declaration order", () => {
    const order = topologicalOrder([run("root"), run("y", ["root"]), run("x", ["root"])]);
    expect(order.map((s) => s.id)).toEqual(["root", "y", "x"]);
  });

  it("should reject cycles", () => {
    expect(() => topologicalOrder([run("a", ["b"]), run("b", ["a"])])).toThrow("Cycle between steps: a, b");
  });

  it("should reject unknown, self and duplicate references", () => {
    expect(() => topologicalOrder([run("a", ["missing"])])).toThrow("step 'a' depends on unknown step 'missing'");
    expect(() => topologicalOrder([run("a", ["a"])])).toThrow("step 'a' depends on itself");
    expect(() => topologicalOrder([run("a"), run("a")])).toThrow(ValidationError);
  });
});

describe("hasUniqueOrder", () => {
  it("should hold for a chain", () => {
    expect(hasUniqueOrder([run("a"), run("b", ["a"]), run("c", ["b"])])).toBe(true);
    expect(hasUniqueOrder([])).toBe(true);
  });

  it("should fail when two steps are ready together", () => {
    expect(hasUniqueOrder([run("a"), run("b")])).toBe(false);
    expect(hasUniqueOrder([run("a"), run("b", ["a"]), run("c", ["a"])])).toBe(false);
  });
});

describe("orderStages", () => {
  it("should run a stage after the stages it copies from", () => {
    const ordered = orderStages([stage("runtime", ["builder"]), stage("builder")]);
    expect(ordered.map((s) => s.name)).toEqual(["builder", "runtime"]);
  });

  it("should list each source stage once", () => {
    expect(stageDependencies(stage("runtime", ["builder", "builder"]))).toEqual(["builder"]);
  });

  it("should reject copies from unknown stages", () => {
    expect(() => orderStages([stage("runtime", ["assets"])])).toThrow(
      "stage 'runtime' depends on unknown stage 'assets'"
    );
  });
});
