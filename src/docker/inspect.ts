/**
 * Image inspection and runtime contract verification.
 *
 * Read-only queries against the Docker daemon plus short-lived probe
 * containers (`docker run --rm`).
 */

import { getNumericIdentity, getVenvBinPath, type PipelineConfig } from "../config.js";
import { DOCKER_PROBE_TIMEOUT } from "../constants.js";
import { DockerError } from "../errors.js";
import { log } from "../logger.js";
import { safeDockerRun } from "./executor.js";

/** The parts of an image config the runtime contract covers. */
export interface ImageConfigSummary {
  user: string;
  workingDir: string;
  exposedPorts: number[];
  env: Record<string, string>;
  labels: Record<string, string>;
}

export interface VerificationCheck {
  name: string;
  ok: boolean;
  expected: string;
  actual: string;
}

export interface VerificationReport {
  ok: boolean;
  checks: VerificationCheck[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

/** Parse the JSON printed by `docker image inspect --format '{{json .Config}}'`. */
export function parseImageConfig(json: string): ImageConfigSummary {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new DockerError(`Unexpected docker inspect output: ${json.slice(0, 200)}`);
  }
  if (!isRecord(raw)) {
    throw new DockerError("Unexpected docker inspect output: not an object");
  }

  const exposed = raw.ExposedPorts;
  const exposedPorts = isRecord(exposed)
    ? Object.keys(exposed)
        .map((key) => parseInt(key.split("/")[0] ?? "", 10))
        .filter((port) => !Number.isNaN(port))
        .sort((a, b) => a - b)
    : [];

  const env: Record<string, string> = {};
  if (Array.isArray(raw.Env)) {
    for (const entry of raw.Env) {
      if (typeof entry !== "string") {continue;}
      const eq = entry.indexOf("=");
      if (eq > 0) {
        env[entry.slice(0, eq)] = entry.slice(eq + 1);
      }
    }
  }

  const labels: Record<string, string> = {};
  if (isRecord(raw.Labels)) {
    for (const [key, value] of Object.entries(raw.Labels)) {
      if (typeof value === "string") {
        labels[key] = value;
      }
    }
  }

  return {
    user: stringField(raw, "User"),
    workingDir: stringField(raw, "WorkingDir"),
    exposedPorts,
    env,
    labels,
  };
}

/**
 * Read an image's config.
 *
 * @throws DockerError if the image does not exist.
 */
export async function inspectImage(image: string): Promise<ImageConfigSummary> {
  const result = await safeDockerRun(["image", "inspect", "--format", "{{json .Config}}", image]);
  if (result.exitCode !== 0) {
    throw new DockerError(`Image not found: ${image}`);
  }
  return parseImageConfig(result.stdout.trim());
}

/** Run a shell snippet in a throwaway container of the image. */
async function probe(image: string, script: string): Promise<string[]> {
  const result = await safeDockerRun(["run", "--rm", "--entrypoint", "sh", image, "-c", script], {
    timeout: DOCKER_PROBE_TIMEOUT,
  });
  if (result.exitCode !== 0) {
    log.debug(`Probe failed in ${image}: ${result.stderr.trim()}`);
  }
  return result.stdout.split(/\r?\n/).map((line) => line.trim());
}

function check(name: string, expected: string, actual: string, ok = expected === actual): VerificationCheck {
  return { name, ok, expected, actual };
}

/**
 * Check a built image against the runtime contract.
 *
 * Static checks read the image config; the interpreter and identity checks
 * run inside a probe container as the image's default user.
 */
export async function verifyImage(image: string, config: PipelineConfig): Promise<VerificationReport> {
  const summary = await inspectImage(image);
  const venvBin = getVenvBinPath(config);
  const path = summary.env.PATH ?? "";

  const [python = "", uid = "", gid = ""] = await probe(image, "command -v python; id -u; id -g");

  const checks: VerificationCheck[] = [
    check("user", getNumericIdentity(config.identity), summary.user),
    check("workdir", config.workdir, summary.workingDir),
    check(
      "ports",
      [...config.ports].sort((a, b) => a - b).join(" "),
      summary.exposedPorts.join(" ")
    ),
    check("path", `${venvBin}:...`, path, path === venvBin || path.startsWith(`${venvBin}:`)),
    check("python", `${venvBin}/python`, python),
    check("uid", String(config.identity.uid), uid),
    check("gid", String(config.identity.gid), gid),
  ];

  return { ok: checks.every((c) => c.ok), checks };
}

/**
 * The frozen dependency set of an image, sorted.
 *
 * @throws DockerError if pip cannot run in the image.
 */
export async function captureFreeze(image: string): Promise<string[]> {
  const result = await safeDockerRun(
    ["run", "--rm", "--entrypoint", "python", image, "-m", "pip", "freeze", "--all"],
    { timeout: DOCKER_PROBE_TIMEOUT }
  );
  if (result.exitCode !== 0) {
    throw new DockerError(`pip freeze failed in ${image}: ${result.stderr.trim()}`);
  }
  return result.stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .sort();
}

export interface FreezeDiff {
  /** Lines only in the first set. */
  removed: string[];
  /** Lines only in the second set. */
  added: string[];
}

export function compareFreeze(a: readonly string[], b: readonly string[]): FreezeDiff {
  const left = new Set(a);
  const right = new Set(b);
  return {
    removed: a.filter((line) => !right.has(line)),
    added: b.filter((line) => !left.has(line)),
  };
}

export function isIdenticalFreeze(diff: FreezeDiff): boolean {
  return diff.removed.length === 0 && diff.added.length === 0;
}
