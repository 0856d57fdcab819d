import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { createPipelineConfig } from "../../src/config.js";
import { parseProgressLine, ProgressTracker } from "../../src/docker/progress.js";
import { planPipeline } from "../../src/pipeline/plan.js";
import type { ImageStage } from "../../src/pipeline/types.js";
import { createTempProject, PINNED_REQUIREMENTS, removeTempProject } from "../mocks/docker-mock.js";

describe("parseProgressLine", () => {
  it("should parse step headers", () => {
    expect(parseProgressLine("#7 [builder  3/11] RUN apt-get update")).toEqual({
      type: "step-start",
      vertex: 7,
      stage: "builder",
      position: 3,
      total: 11,
      instruction: "RUN apt-get update",
    });
  });

  it("should accept the padding BuildKit puts before single-digit positions", () => {
    expect(parseProgressLine("#11 [builder  9/11] RUN pip install --no-cache-dir -r requirements.txt")).toEqual({
      type: "step-start",
      vertex: 11,
      stage: "builder",
      position: 9,
      total: 11,
      instruction: "RUN pip install --no-cache-dir -r requirements.txt",
    });
  });

  it("should parse cache hits and completions", () => {
    expect(parseProgressLine("#8 CACHED")).toEqual({ type: "step-cached", vertex: 8 });
    expect(parseProgressLine("#8 DONE 14.2s\n")).toEqual({ type: "step-done", vertex: 8, seconds: 14.2 });
  });

  it("should extract the exit code from errors", () => {
    expect(
      parseProgressLine('#9 ERROR: process "/bin/sh -c pip check" did not complete successfully: exit code: 1')
    ).toEqual({
      type: "step-error",
      vertex: 9,
      message: 'process "/bin/sh -c pip check" did not complete successfully: exit code: 1',
      exitCode: 1,
    });
    expect(parseProgressLine("#9 ERROR: failed to compute cache key")).toEqual({
      type: "step-error",
      vertex: 9,
      message: "failed to compute cache key",
    });
  });

  it("should treat everything else as log output", () => {
    expect(parseProgressLine("#7 0.412 Get:1 http://deb.debian.org/debian bookworm InRelease")).toEqual({
      type: "log",
      vertex: 7,
      text: "Get:1 http://deb.debian.org/debian bookworm InRelease",
    });
    expect(parseProgressLine("ERROR: failed to solve")).toEqual({ type: "log", text: "ERROR: failed to solve" });
  });
});

describe("ProgressTracker", () => {
  let dir = "";
  let builder: ImageStage;
  let runtime: ImageStage;

  beforeAll(() => {
    dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS });
    const [first, second] = planPipeline(dir, createPipelineConfig()).stages;
    if (!first || !second) {
      throw new Error("expected two stages");
    }
    builder = first;
    runtime = second;
  });

  afterAll(() => {
    removeTempProject(dir);
  });

  it("should map vertices to steps", () => {
    const tracker = new ProgressTracker(builder);

    expect(tracker.handle("#5 [builder  3/11] RUN apt-get update")).toEqual({ type: "start", step: "system-deps" });
    expect(tracker.handle("#5 0.100 Reading package lists...")).toBeUndefined();
    expect(tracker.handle("#5 CACHED")).toEqual({ type: "done", step: "system-deps", cached: true });
    expect(tracker.handle("#6 [builder  4/11] ADD https://astral.sh/uv/install.sh /uv-installer.sh")).toEqual({
      type: "start",
      step: "fetch-installer",
    });
    expect(tracker.handle("#6 DONE 0.4s")).toEqual({ type: "done", step: "fetch-installer", cached: false });
    expect(tracker.isFinished("fetch-installer")).toBe(true);
    expect(tracker.isFinished("run-installer")).toBe(false);
  });

  it("should ignore FROM, WORKDIR and repeated records", () => {
    const tracker = new ProgressTracker(builder);

    expect(tracker.handle("#3 [builder  1/11] FROM docker.io/library/python:3.12-bookworm")).toBeUndefined();
    expect(tracker.handle("#3 DONE 0.0s")).toBeUndefined();
    expect(tracker.handle("#5 [builder  3/11] RUN apt-get update")).toEqual({ type: "start", step: "system-deps" });
    expect(tracker.handle("#5 [builder  3/11] RUN apt-get update")).toBeUndefined();
    tracker.handle("#5 DONE 1.0s");
    expect(tracker.handle("#5 DONE 1.0s")).toBeUndefined();
  });

  it("should ignore the builder's vertices during a runtime build", () => {
    const tracker = new ProgressTracker(runtime);

    expect(tracker.handle("#5 [builder  3/11] RUN apt-get update")).toBeUndefined();
    expect(tracker.handle("#5 CACHED")).toBeUndefined();
    expect(tracker.handle("#5 ERROR: boom")).toBeUndefined();
    expect(tracker.error).toBeUndefined();
    expect(tracker.handle("#12 [runtime 3/7] RUN groupadd --system --gid 1001 app_group")).toEqual({
      type: "start",
      step: "create-identity",
    });
  });

  it("should remember the last error of the stage", () => {
    const tracker = new ProgressTracker(builder);
    tracker.handle("#13 [builder 11/11] RUN python -m pip check");
    const event = tracker.handle("#13 ERROR: process did not complete successfully: exit code: 1");

    expect(event).toEqual({
      type: "error",
      step: "sync-locked",
      message: "process did not complete successfully: exit code: 1",
      exitCode: 1,
    });
    expect(tracker.error).toEqual({
      step: "sync-locked",
      message: "process did not complete successfully: exit code: 1",
      exitCode: 1,
    });
  });
});
