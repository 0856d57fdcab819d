import { readFileSync } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { resolveBuildSettings } from "../../src/commands/build.js";
import { check, collectIssues } from "../../src/commands/check.js";
import { envFlagsToRecord, loadProject, type ProjectContext, resolveImageName } from "../../src/commands/context.js";
import { formatPlan } from "../../src/commands/plan.js";
import { render } from "../../src/commands/render.js";
import { createPipelineConfig } from "../../src/config.js";
import { renderDockerfile } from "../../src/dockerfile-gen.js";
import { disableQuietMode, setLogSink } from "../../src/logger.js";
import { planPipeline } from "../../src/pipeline/plan.js";
import { createTempProject, PINNED_REQUIREMENTS, removeTempProject } from "../mocks/docker-mock.js";

let dir = "";
let home = "";
let out: string[] = [];

beforeEach(() => {
  home = createTempProject({});
  vi.stubEnv("HOME", home);
  disableQuietMode();
  out = [];
  setLogSink({ out: (message) => out.push(message), err: () => undefined });
});

afterEach(() => {
  setLogSink();
  vi.unstubAllEnvs();
  removeTempProject(dir);
  removeTempProject(home);
});

function contextFor(files: Record<string, string>): ProjectContext {
  dir = createTempProject(files);
  return loadProject({ path: dir });
}

describe("loadProject", () => {
  it("should apply CLI flags over the project config", () => {
    dir = createTempProject({
      "venvship.yaml": "name: billing\nports: 9100\nenv:\n  LOG_LEVEL: info\n  REGION: eu\n",
    });
    const ctx = loadProject({ path: dir, env: ["LOG_LEVEL=debug"], ports: "9200 9201" });

    expect(ctx.projectPath).toBe(dir);
    expect(ctx.config.ports).toEqual([9200, 9201]);
    expect(ctx.config.env).toEqual({ LOG_LEVEL: "debug", REGION: "eu" });
    expect(resolveImageName(ctx)).toBe("billing:latest");
    expect(resolveImageName(ctx, { tag: "v2" })).toBe("billing:v2");
    expect(resolveImageName(ctx, { name: "Billing API" })).toBe("billing-api:latest");
  });

  it("should let later env flags win", () => {
    expect(envFlagsToRecord(["A=1", "B=2", "A=3"])).toEqual({ A: "3", B: "2" });
  });
});

describe("resolveBuildSettings", () => {
  it("should fall back to the config file, then defaults", () => {
    const ctx = contextFor({ "venvship.yaml": "name: svc\ncache: false\nbuildTimeout: 60\n" });

    expect(resolveBuildSettings(ctx, { cache: true })).toEqual({
      image: "svc:latest",
      progress: "auto",
      cache: false,
      pull: false,
      preflight: true,
      verify: false,
      timeout: 60_000,
    });
  });

  it("should let flags override the file", () => {
    const ctx = contextFor({ "venvship.yaml": "name: svc\npreflight: true\nprogress: tty\n" });
    const settings = resolveBuildSettings(ctx, { preflight: false, progress: "plain", buildTimeout: 0, tag: "rc1" });

    expect(settings).toMatchObject({ image: "svc:rc1", preflight: false, progress: "plain", timeout: 0 });
  });
});

describe("check", () => {
  it("should report preflight failures as issues", () => {
    const ctx = contextFor({ "main.py": "" });

    expect(collectIssues(ctx)).toEqual([
      {
        severity: "error",
        code: "PREFLIGHT",
        stage: "builder",
        step: "install-deps",
        message: "requirements.txt not found in build context",
      },
    ]);
    expect(check(ctx)).toBe(1);
  });

  it("should pass a well-formed project", () => {
    const ctx = contextFor({ "requirements.txt": PINNED_REQUIREMENTS });
    expect(check(ctx)).toBe(0);
  });
});

describe("render", () => {
  it("should print the Dockerfile", () => {
    const ctx = contextFor({ "requirements.txt": PINNED_REQUIREMENTS });
    expect(render(ctx)).toBe(0);
    expect(out).toEqual([renderDockerfile(planPipeline(dir, ctx.config)).trimEnd()]);
  });

  it("should write the Dockerfile and its ignore file", () => {
    const ctx = contextFor({ "requirements.txt": PINNED_REQUIREMENTS });
    const output = join(dir, "Dockerfile");
    render(ctx, { output });

    expect(readFileSync(output, "utf-8")).toBe(renderDockerfile(planPipeline(dir, ctx.config)));
    expect(readFileSync(`${output}.dockerignore`, "utf-8")).toBe(
      ".venv\n.git\n**/__pycache__\n**/*.pyc\n**/.pytest_cache\n**/.mypy_cache\n"
    );
  });
});

describe("formatPlan", () => {
  it("should list stages and steps with their reached states", () => {
    dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS });
    const plan = planPipeline(dir, createPipelineConfig());
    const lines = formatPlan(plan, new Map());

    expect(lines[0]).toBe(`manifest-hash ${plan.manifestHash}`);
    expect(lines.slice(1, 5)).toEqual([
      "",
      "1. builder FROM python:3.12-bookworm -> BaseBuilder",
      "    1. system-deps []",
      "       RUN apt-get update",
    ]);
    expect(lines).toContain("    8. install-deps -> DepsInstalled []");
    expect(lines).toContain("2. runtime FROM python:3.12-slim-bookworm (shipped) -> BaseRuntime");
    expect(lines).toContain("    3. switch-identity -> IdentitySwitched []");
  });
});
