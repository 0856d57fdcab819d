/**
 * Constants module for venvship.
 *
 * All timeout values, defaults and shared names are defined here (SSOT).
 */

import { readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

// === Version (SSOT: package.json) ===
function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export const VERSION: string = readPackageVersion();

// === Naming (SSOT) ===
export const VENVSHIP_PREFIX = "venvship";
export const LABEL_PREFIX = "venvship";

// === Docker Timeouts (milliseconds) ===
export const DOCKER_COMMAND_TIMEOUT = 30_000; // Quick docker commands (info, inspect, rmi)
export const DOCKER_BUILD_TIMEOUT = 1_800_000; // 30 min per stage build
export const DOCKER_PROBE_TIMEOUT = 60_000; // docker run probes during verification

// === Stage names ===
export const BUILDER_STAGE = "builder";
export const RUNTIME_STAGE = "runtime";

// === Pipeline defaults ===
export const DEFAULT_BUILDER_IMAGE = "python:3.12-bookworm";
export const DEFAULT_RUNTIME_IMAGE = "python:3.12-slim-bookworm";
export const DEFAULT_WORKDIR = "/app";
export const DEFAULT_VENV_DIR = ".venv";
export const DEFAULT_USER = "app_user";
export const DEFAULT_GROUP = "app_group";
export const DEFAULT_UID = 1001;
export const DEFAULT_GID = 1001;
export const DEFAULT_PORTS: readonly number[] = [9001, 9002, 9003, 9004];
export const DEFAULT_REQUIREMENTS = "requirements.txt";
export const DEFAULT_SYSTEM_PACKAGES: readonly string[] = ["git", "gcc", "g++", "build-essential"];
export const DEFAULT_INSTALLER_URL = "https://astral.sh/uv/install.sh";
export const PACKAGING_TOOLS: readonly string[] = ["pip", "setuptools", "wheel"];
export const INSTALLER_PATH = "/uv-installer.sh";
export const UV_INSTALL_DIR = "/usr/local/bin";

// === Manifest files ===
export const PROJECT_DESCRIPTOR = "pyproject.toml";
export const LOCK_FILE = "uv.lock";

// === Build context exclusions (written as Dockerfile.dockerignore) ===
export const CONTEXT_EXCLUDES: readonly string[] = [
  ".git",
  "**/__pycache__",
  "**/*.pyc",
  "**/.pytest_cache",
  "**/.mypy_cache",
];

// === Temp Paths (SSOT) ===
/** Get base temp directory for venvship. */
export function getVenvshipTempDir(): string {
  return join(tmpdir(), VENVSHIP_PREFIX);
}

/** Get temp directory for Docker builds. */
export function getVenvshipTempBuild(subdir?: string): string {
  const base = join(getVenvshipTempDir(), "build");
  return subdir ? join(base, subdir) : base;
}
