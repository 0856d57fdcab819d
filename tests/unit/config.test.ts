import { describe, expect, it } from "vitest";

import {
  createPipelineConfig,
  getImageName,
  getNumericIdentity,
  getOwner,
  getVenvBinPath,
  getVenvPath,
} from "../../src/config.js";

describe("createPipelineConfig", () => {
  it("should fill in the default service layout", () => {
    const config = createPipelineConfig();

    expect(config.builderImage).toBe("python:3.12-bookworm");
    expect(config.runtimeImage).toBe("python:3.12-slim-bookworm");
    expect(config.workdir).toBe("/app");
    expect(config.ports).toEqual([9001, 9002, 9003, 9004]);
    expect(config.identity).toEqual({ user: "app_user", group: "app_group", uid: 1001, gid: 1001 });
    expect(config.requirements).toBe("requirements.txt");
    expect(config.command).toBeUndefined();
    expect(config.portLabels).toEqual({});
  });

  it("should return a frozen config", () => {
    const config = createPipelineConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.ports)).toBe(true);
  });

  it("should drop duplicate ports", () => {
    expect(createPipelineConfig({ ports: [9001, 9001, 9100] }).ports).toEqual([9001, 9100]);
  });

  it("should reject an empty port list", () => {
    expect(() => createPipelineConfig({ ports: [] })).toThrow("At least one port must be declared");
  });

  it("should reject labels for ports that are not exposed", () => {
    expect(() => createPipelineConfig({ ports: [9001], portLabels: { 9002: "metrics" } })).toThrow(
      "Port label for 9002, which is not an exposed port"
    );
  });

  it("should reject PATH overrides and reserved label prefixes", () => {
    expect(() => createPipelineConfig({ env: { PATH: "/usr/bin" } })).toThrow("PATH is managed by venvship");
    expect(() => createPipelineConfig({ labels: { "venvship.version": "1" } })).toThrow("reserved 'venvship.' prefix");
  });

  it("should require an https installer", () => {
    expect(() => createPipelineConfig({ installerUrl: "http://example.test/install.sh" })).toThrow(
      "Installer URL must use https"
    );
    expect(() => createPipelineConfig({ installerUrl: "not a url" })).toThrow("Invalid installer URL");
  });

  it("should reject a requirements file outside the context root", () => {
    expect(() => createPipelineConfig({ requirements: "reqs/prod.txt" })).toThrow(
      "requirements must be a file at the root of the build context: 'reqs/prod.txt'"
    );
  });

  it("should reject malformed system packages", () => {
    expect(() => createPipelineConfig({ systemPackages: ["gcc; rm -rf /"] })).toThrow("Invalid system package name");
  });

  it("should treat an empty command as no command", () => {
    expect(createPipelineConfig({ command: [] }).command).toBeUndefined();
    expect(createPipelineConfig({ command: ["python", "-m", "service"] }).command).toEqual(["python", "-m", "service"]);
  });
});

describe("derived paths", () => {
  it("should place the venv under the workdir", () => {
    const config = createPipelineConfig();
    expect(getVenvPath(config)).toBe("/app/.venv");
    expect(getVenvBinPath(config)).toBe("/app/.venv/bin");
  });

  it("should not double the slash for a root workdir", () => {
    expect(getVenvPath(createPipelineConfig({ workdir: "/" }))).toBe("/.venv");
  });

  it("should format owners by name and identity by number", () => {
    const { identity } = createPipelineConfig({ uid: 2000, gid: 3000 });
    expect(getOwner(identity)).toBe("app_user:app_group");
    expect(getNumericIdentity(identity)).toBe("2000:3000");
  });
});

describe("getImageName", () => {
  it("should sanitize project names", () => {
    expect(getImageName("My Service")).toBe("my-service:latest");
    expect(getImageName("--api", "v2")).toBe("api:v2");
    expect(getImageName("***")).toBe("app:latest");
  });
});
