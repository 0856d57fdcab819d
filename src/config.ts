/**
 * Pipeline configuration for venvship.
 *
 * Dependency direction:
 *   This module has minimal dependencies (near-leaf module).
 *   It may be imported by: cli.ts, pipeline/*, build.ts, docker/*
 *   It should NOT import from: cli, build
 */

import { LABEL_PREFIX } from "./constants.js";
import {
  DEFAULT_BUILDER_IMAGE,
  DEFAULT_GID,
  DEFAULT_GROUP,
  DEFAULT_INSTALLER_URL,
  DEFAULT_PORTS,
  DEFAULT_REQUIREMENTS,
  DEFAULT_RUNTIME_IMAGE,
  DEFAULT_SYSTEM_PACKAGES,
  DEFAULT_UID,
  DEFAULT_USER,
  DEFAULT_VENV_DIR,
  DEFAULT_WORKDIR,
} from "./constants.js";
import { ValidationError } from "./errors.js";
import {
  parsePort,
  sanitizeEnvValue,
  validateAccountId,
  validateAccountName,
  validateContainerPath,
  validateContextRootFile,
  validateEnvVarKey,
  validateImageReference,
  validateLabelKey,
  validateRelativePath,
} from "./validation.js";

/** Docker build progress output mode. */
export type ProgressMode = "auto" | "plain" | "tty";

/** Non-root user/group pair the shipped process runs as. */
export interface RuntimeIdentity {
  readonly user: string;
  readonly group: string;
  readonly uid: number;
  readonly gid: number;
}

/** Fully resolved pipeline configuration. */
export interface PipelineConfig {
  readonly builderImage: string;
  readonly runtimeImage: string;
  /** Absolute working directory in both stages. */
  readonly workdir: string;
  /** Virtual environment directory, relative to workdir. */
  readonly venvDir: string;
  readonly identity: RuntimeIdentity;
  readonly ports: readonly number[];
  /** Optional descriptions stamped as venvship.port.<n> labels. */
  readonly portLabels: Readonly<Record<number, string>>;
  /** Mandatory requirements manifest, relative to the context. */
  readonly requirements: string;
  readonly systemPackages: readonly string[];
  readonly installerUrl: string;
  /** Extra ENV for the runtime stage. */
  readonly env: Readonly<Record<string, string>>;
  readonly labels: Readonly<Record<string, string>>;
  /** Exec-form CMD for the runtime stage, if any. */
  readonly command: readonly string[] | undefined;
}

/** Partial input accepted by createPipelineConfig (CLI flags, config files). */
export interface PipelineConfigInput {
  builderImage?: string;
  runtimeImage?: string;
  workdir?: string;
  venvDir?: string;
  user?: string;
  group?: string;
  uid?: number;
  gid?: number;
  ports?: readonly number[];
  portLabels?: Record<number, string>;
  requirements?: string;
  systemPackages?: readonly string[];
  installerUrl?: string;
  env?: Record<string, string>;
  labels?: Record<string, string>;
  command?: readonly string[];
}

const APT_PACKAGE_PATTERN = /^[a-z0-9][a-z0-9+.-]+$/;

function validateInstallerUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid installer URL '${url}'`);
  }
  if (parsed.protocol !== "https:") {
    throw new ValidationError(`Installer URL must use https: '${url}'`);
  }
  return url;
}

function validateEnv(env: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    validateEnvVarKey(key);
    if (key === "PATH") {
      throw new ValidationError("PATH is managed by venvship and cannot be overridden");
    }
    result[key] = sanitizeEnvValue(value);
  }
  return result;
}

function validateLabels(labels: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    validateLabelKey(key);
    if (key.startsWith(`${LABEL_PREFIX}.`)) {
      throw new ValidationError(`Label '${key}' uses the reserved '${LABEL_PREFIX}.' prefix`);
    }
    result[key] = sanitizeEnvValue(value);
  }
  return result;
}

/**
 * Build a validated configuration, filling in defaults.
 *
 * @throws ValidationError on the first invalid field.
 */
export function createPipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  const builderImage = validateImageReference(input.builderImage ?? DEFAULT_BUILDER_IMAGE, "builderImage");
  const runtimeImage = validateImageReference(input.runtimeImage ?? DEFAULT_RUNTIME_IMAGE, "runtimeImage");

  const identity: RuntimeIdentity = Object.freeze({
    user: validateAccountName(input.user ?? DEFAULT_USER, "user"),
    group: validateAccountName(input.group ?? DEFAULT_GROUP, "group"),
    uid: validateAccountId(input.uid ?? DEFAULT_UID, "uid"),
    gid: validateAccountId(input.gid ?? DEFAULT_GID, "gid"),
  });

  const ports = [...new Set((input.ports ?? DEFAULT_PORTS).map((p) => parsePort(p)))];
  if (ports.length === 0) {
    throw new ValidationError("At least one port must be declared");
  }

  const portLabels: Record<number, string> = {};
  for (const [key, description] of Object.entries(input.portLabels ?? {})) {
    const port = parsePort(key);
    if (!ports.includes(port)) {
      throw new ValidationError(`Port label for ${port}, which is not an exposed port`);
    }
    portLabels[port] = sanitizeEnvValue(description);
  }

  const systemPackages = [...(input.systemPackages ?? DEFAULT_SYSTEM_PACKAGES)];
  for (const pkg of systemPackages) {
    if (!APT_PACKAGE_PATTERN.test(pkg)) {
      throw new ValidationError(`Invalid system package name '${pkg}'`);
    }
  }

  const command = input.command && input.command.length > 0 ? [...input.command] : undefined;

  return Object.freeze({
    builderImage,
    runtimeImage,
    workdir: validateContainerPath(input.workdir ?? DEFAULT_WORKDIR, "workdir"),
    venvDir: validateRelativePath(input.venvDir ?? DEFAULT_VENV_DIR, "venvDir"),
    identity,
    ports: Object.freeze(ports),
    portLabels: Object.freeze(portLabels),
    requirements: validateContextRootFile(input.requirements ?? DEFAULT_REQUIREMENTS, "requirements"),
    systemPackages: Object.freeze(systemPackages),
    installerUrl: validateInstallerUrl(input.installerUrl ?? DEFAULT_INSTALLER_URL),
    env: Object.freeze(validateEnv(input.env ?? {})),
    labels: Object.freeze(validateLabels(input.labels ?? {})),
    command: command ? Object.freeze(command) : undefined,
  });
}

/** Absolute path of the virtual environment inside the image. */
export function getVenvPath(config: PipelineConfig): string {
  return config.workdir === "/" ? `/${config.venvDir}` : `${config.workdir}/${config.venvDir}`;
}

/** Executable directory of the virtual environment. */
export function getVenvBinPath(config: PipelineConfig): string {
  return `${getVenvPath(config)}/bin`;
}

/** `user:group` owner string used by chown and COPY --chown. */
export function getOwner(identity: RuntimeIdentity): string {
  return `${identity.user}:${identity.group}`;
}

/** Numeric `uid:gid` used by USER. */
export function getNumericIdentity(identity: RuntimeIdentity): string {
  return `${identity.uid}:${identity.gid}`;
}

/**
 * Get the image name for a project.
 *
 * Sanitizes the project name into a valid repository path.
 */
export function getImageName(projectName: string, tag = "latest"): string {
  const safeName = projectName
    .toLowerCase()
    .replace(/[^a-z0-9_.-]/g, "-")
    .replace(/^[^a-z0-9]+/, "")
    .slice(0, 128) || "app";
  return `${safeName}:${tag}`;
}
