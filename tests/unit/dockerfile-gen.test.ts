import { afterEach, describe, expect, it } from "vitest";

import { createPipelineConfig } from "../../src/config.js";
import {
  renderDockerfile,
  renderDockerignore,
  renderInstruction,
  vertexMap,
} from "../../src/dockerfile-gen.js";
import { planPipeline } from "../../src/pipeline/plan.js";
import type { BuildStep, PipelinePlan } from "../../src/pipeline/types.js";
import { createTempProject, PINNED_REQUIREMENTS, removeTempProject } from "../mocks/docker-mock.js";

const base = { description: "", dependsOn: [] };

describe("renderInstruction", () => {
  it("should split chained shell commands over continuation lines", () => {
    const step: BuildStep = { ...base, id: "r", kind: "run", command: "apt-get update && apt-get install -y gcc" };
    expect(renderInstruction(step)).toBe("RUN apt-get update \\\n    && apt-get install -y gcc");
  });

  it("should render copies with their flags", () => {
    const step: BuildStep = {
      ...base,
      id: "c",
      kind: "copy",
      from: "builder",
      chown: "app_user:app_group",
      sources: ["/app"],
      destination: "/app",
    };
    expect(renderInstruction(step)).toBe("COPY --from=builder --chown=app_user:app_group /app /app");
  });

  it("should quote env values only when needed", () => {
    const step: BuildStep = {
      ...base,
      id: "e",
      kind: "env",
      vars: { PATH: "/app/.venv/bin:$PATH", GREETING: 'say "hi"', EMPTY: "" },
    };
    expect(renderInstruction(step)).toBe(
      'ENV PATH=/app/.venv/bin:$PATH \\\n    GREETING="say \\"hi\\"" \\\n    EMPTY=""'
    );
  });

  it("should always quote labels", () => {
    const step: BuildStep = { ...base, id: "l", kind: "label", labels: { team: "payments" } };
    expect(renderInstruction(step)).toBe('LABEL team="payments"');
  });

  it("should render the remaining kinds", () => {
    expect(renderInstruction({ ...base, id: "u", kind: "user", user: "1001:1001" })).toBe("USER 1001:1001");
    expect(renderInstruction({ ...base, id: "x", kind: "expose", ports: [9001, 9002] })).toBe("EXPOSE 9001 9002");
    expect(renderInstruction({ ...base, id: "a", kind: "add", source: "https://example.test/i.sh", destination: "/i.sh" })).toBe(
      "ADD https://example.test/i.sh /i.sh"
    );
    expect(renderInstruction({ ...base, id: "m", kind: "cmd", argv: ["python", "-m", "service"] })).toBe(
      'CMD ["python","-m","service"]'
    );
  });
});

describe("renderDockerfile", () => {
  let dir = "";
  let plan: PipelinePlan;

  afterEach(() => {
    removeTempProject(dir);
  });

  const planService = () => {
    dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS, "main.py": "print('hi')\n" });
    plan = planPipeline(dir, createPipelineConfig());
    return renderDockerfile(plan);
  };

  it("should render both stages in order after the syntax header", () => {
    const dockerfile = planService();
    const lines = dockerfile.split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "# syntax=docker/dockerfile:1",
      "",
      "FROM python:3.12-bookworm AS builder",
      "WORKDIR /app",
    ]);
    expect(lines.filter((line) => line.startsWith("FROM "))).toEqual([
      "FROM python:3.12-bookworm AS builder",
      "FROM python:3.12-slim-bookworm AS runtime",
    ]);
    expect(dockerfile.endsWith("\n")).toBe(true);
  });

  it("should describe each step in a comment above it", () => {
    const dockerfile = planService();
    expect(dockerfile).toContain("\n\n# Install declared dependencies\nRUN pip install --no-cache-dir -r requirements.txt\n");
    expect(dockerfile).toContain("\n\n# Materialize the environment from the lock file\nRUN python -m pip check\n");
  });

  it("should ship a non-root service contract", () => {
    const lines = planService().split("\n");

    expect(lines).toContain("USER 1001:1001");
    expect(lines).toContain("EXPOSE 9001 9002 9003 9004");
    expect(lines).toContain("COPY --from=builder --chown=app_user:app_group /app/.venv /app/.venv");
    expect(lines).toContain("COPY requirements.txt* pyproject.toml* uv.lock* ./");
    expect(lines.indexOf("USER 1001:1001")).toBeLessThan(
      lines.indexOf("COPY --from=builder --chown=app_user:app_group /app /app")
    );
  });
});

describe("renderDockerignore", () => {
  it("should exclude the local venv and caches", () => {
    expect(renderDockerignore(createPipelineConfig())).toBe(
      ".venv\n.git\n**/__pycache__\n**/*.pyc\n**/.pytest_cache\n**/.mypy_cache\n"
    );
  });
});

describe("vertexMap", () => {
  it("should number filesystem steps after FROM and WORKDIR", () => {
    const dir = createTempProject({ "requirements.txt": PINNED_REQUIREMENTS });
    try {
      const [builder, runtime] = planPipeline(dir, createPipelineConfig()).stages;
      if (!builder || !runtime) {
        throw new Error("expected two stages");
      }

      const builderMap = vertexMap(builder);
      expect(builderMap.get(3)).toBe("system-deps");
      expect(builderMap.get(6)).toBe("create-venv");
      expect(builderMap.get(11)).toBe("sync-locked");

      expect([...vertexMap(runtime).entries()]).toEqual([
        [3, "create-identity"],
        [4, "own-workdir"],
        [5, "copy-artifacts"],
        [6, "copy-venv"],
        [7, "recopy-source"],
      ]);
    } finally {
      removeTempProject(dir);
    }
  });
});
