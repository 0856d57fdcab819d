import { afterEach, describe, expect, it } from "vitest";

import { createPipelineConfig } from "../../src/config.js";
import { VERSION } from "../../src/constants.js";
import { detectManifests } from "../../src/manifest.js";
import { hasUniqueOrder } from "../../src/pipeline/graph.js";
import { getShippedStage, planPipeline } from "../../src/pipeline/plan.js";
import { createBuilderStage, createRuntimeStage, getImageLabels, getSyncCommand } from "../../src/pipeline/stages.js";
import { type BuildStep, PipelineState } from "../../src/pipeline/types.js";
import { createTempProject, PINNED_REQUIREMENTS, removeTempProject } from "../mocks/docker-mock.js";

const config = createPipelineConfig();

function step(steps: readonly BuildStep[], id: string): BuildStep {
  const found = steps.find((s) => s.id === id);
  if (!found) {
    throw new Error(`no step ${id}`);
  }
  return found;
}

describe("getSyncCommand", () => {
  const manifests = (hasDescriptor: boolean) => ({
    files: [],
    hasRequirements: true,
    hasDescriptor,
    hasLock: hasDescriptor,
  });

  it("should sync from the lock when a project descriptor exists", () => {
    expect(getSyncCommand(manifests(true))).toBe("uv sync --locked");
  });

  it("should check the installed set for requirements-only projects", () => {
    expect(getSyncCommand(manifests(false))).toBe("python -m pip check");
  });
});

describe("createBuilderStage", () => {
  let dir = "";

  afterEach(() => {
    removeTempProject(dir);
  });

  it("should declare a single chain of builder steps", () => {
    dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS });
    const builder = createBuilderStage(config, detectManifests(dir, config));

    expect(builder.name).toBe("builder");
    expect(builder.shipped).toBe(false);
    expect(builder.baseState).toBe(PipelineState.BASE_BUILDER);
    expect(builder.steps.map((s) => s.id)).toEqual([
      "system-deps",
      "fetch-installer",
      "run-installer",
      "venv-env",
      "create-venv",
      "upgrade-tools",
      "copy-manifests",
      "install-deps",
      "copy-source",
      "sync-locked",
    ]);
    expect(hasUniqueOrder(builder.steps)).toBe(true);
  });

  it("should copy only manifests before installing", () => {
    dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS });
    const builder = createBuilderStage(config, detectManifests(dir, config));

    expect(step(builder.steps, "copy-manifests")).toMatchObject({
      kind: "copy",
      sources: ["requirements.txt*", "pyproject.toml*", "uv.lock*"],
      destination: "./",
    });
    expect(step(builder.steps, "install-deps")).toMatchObject({
      command: "pip install --no-cache-dir -r requirements.txt",
      reaches: PipelineState.DEPS_INSTALLED,
    });
    expect(step(builder.steps, "sync-locked")).toMatchObject({ command: "python -m pip check" });
  });

  it("should remove the installer in the layer that runs it", () => {
    dir = createTempProject({});
    const builder = createBuilderStage(config, detectManifests(dir, config));

    expect(step(builder.steps, "fetch-installer")).toMatchObject({
      kind: "add",
      source: "https://astral.sh/uv/install.sh",
      destination: "/uv-installer.sh",
    });
    expect(step(builder.steps, "run-installer")).toMatchObject({
      command: "UV_INSTALL_DIR=/usr/local/bin sh /uv-installer.sh && rm /uv-installer.sh",
    });
  });

  it("should install the configured system packages", () => {
    dir = createTempProject({});
    const custom = createPipelineConfig({ systemPackages: ["gcc", "libpq-dev"] });
    const builder = createBuilderStage(custom, detectManifests(dir, custom));

    expect(step(builder.steps, "system-deps")).toMatchObject({
      command:
        "apt-get update && apt-get install -y --no-install-recommends gcc libpq-dev && rm -rf /var/lib/apt/lists/*",
    });
  });
});

describe("createRuntimeStage", () => {
  it("should switch to the numeric identity before copying", () => {
    const runtime = createRuntimeStage(config, "0123456789abcdef");

    expect(runtime.shipped).toBe(true);
    expect(runtime.baseImage).toBe("python:3.12-slim-bookworm");
    expect(step(runtime.steps, "switch-identity")).toMatchObject({ kind: "user", user: "1001:1001" });
    expect(step(runtime.steps, "copy-artifacts")).toMatchObject({
      from: "builder",
      chown: "app_user:app_group",
      sources: ["/app"],
      destination: "/app",
    });
    expect(step(runtime.steps, "copy-venv")).toMatchObject({ sources: ["/app/.venv"], destination: "/app/.venv" });
    expect(step(runtime.steps, "recopy-source")).toMatchObject({ chown: "app_user:app_group", sources: ["."] });
  });

  it("should prepend the venv to PATH and keep user env", () => {
    const runtime = createRuntimeStage(createPipelineConfig({ env: { LOG_LEVEL: "info" } }), "0123456789abcdef");

    expect(step(runtime.steps, "configure-path")).toMatchObject({
      vars: { VIRTUAL_ENV: "/app/.venv", PATH: "/app/.venv/bin:$PATH", LOG_LEVEL: "info" },
    });
  });

  it("should expose the configured ports", () => {
    const runtime = createRuntimeStage(config, "0123456789abcdef");
    expect(step(runtime.steps, "expose-ports")).toMatchObject({ ports: [9001, 9002, 9003, 9004] });
  });

  it("should add a command step only when configured", () => {
    expect(createRuntimeStage(config, "h").steps.some((s) => s.id === "command")).toBe(false);

    const withCommand = createRuntimeStage(createPipelineConfig({ command: ["python", "-m", "service"] }), "h");
    expect(step(withCommand.steps, "command")).toMatchObject({ kind: "cmd", argv: ["python", "-m", "service"] });
    expect(hasUniqueOrder(withCommand.steps)).toBe(true);
  });
});

describe("getImageLabels", () => {
  it("should stamp version, manifest hash, port descriptions and user labels", () => {
    const labelled = createPipelineConfig({
      ports: [9001, 9002],
      portLabels: { 9002: "metrics" },
      labels: { team: "payments" },
    });
    expect(getImageLabels(labelled, "0123456789abcdef")).toEqual({
      "venvship.version": VERSION,
      "venvship.manifest-hash": "0123456789abcdef",
      "venvship.port.9002": "metrics",
      team: "payments",
    });
  });
});

describe("planPipeline", () => {
  let dir = "";

  afterEach(() => {
    removeTempProject(dir);
  });

  it("should order the builder before the shipped runtime", () => {
    dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS, "main.py": "print('hi')\n" });
    const plan = planPipeline(dir, config);

    expect(plan.stages.map((s) => s.name)).toEqual(["builder", "runtime"]);
    expect(getShippedStage(plan)?.name).toBe("runtime");
    expect(plan.manifests.hasRequirements).toBe(true);
    expect(plan.manifestHash).toMatch(/^[0-9a-f]{16}$/);
    expect(Object.isFrozen(plan)).toBe(true);
  });
});
