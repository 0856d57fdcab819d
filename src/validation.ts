/**
 * Input validation utilities for venvship.
 *
 * Centralized validation functions for environment variables, ports,
 * numeric ids, image references and container paths.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, pipeline, docker
 */

import { ValidationError } from "./errors.js";

/** POSIX environment variable key pattern: [A-Za-z_][A-Za-z0-9_]* */
const ENV_VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** POSIX portable user/group name (as accepted by useradd/groupadd). */
const ACCOUNT_NAME_PATTERN = /^[a-z_][a-z0-9_-]{0,31}$/;

/**
 * Image reference: [registry[:port]/]path[:tag][@digest].
 * Loose on purpose: Docker itself is the final authority.
 */
const IMAGE_REF_PATTERN = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?::[0-9]+)?(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*(?::[\w][\w.-]{0,127})?(?:@sha256:[a-f0-9]{64})?$/;

/** Label keys: reverse-DNS style, lower-case. */
const LABEL_KEY_PATTERN = /^[a-z0-9]+(?:[._-][a-z0-9]+)*$/;

/** Lowest port an unprivileged process may bind. */
export const MIN_UNPRIVILEGED_PORT = 1024;
export const MAX_PORT = 65535;

export function isValidEnvVarKey(key: string): boolean {
  return ENV_VAR_KEY_PATTERN.test(key);
}

/**
 * Validate environment variable key and throw if invalid.
 *
 * @throws ValidationError if key is invalid.
 */
export function validateEnvVarKey(key: string): void {
  if (!isValidEnvVarKey(key)) {
    throw new ValidationError(
      `Invalid env var key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }
}

/**
 * Sanitize environment variable value for use in a Dockerfile.
 *
 * Removes newlines and null bytes, which would end the instruction early.
 */
export function sanitizeEnvValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  return value.replace(/[\r\n\x00]/g, "");
}

/**
 * Parse and validate environment variable, throwing on invalid format.
 *
 * @throws ValidationError if format is invalid.
 */
export function parseEnvVarStrict(envVar: string): { key: string; value: string } {
  const eqIdx = envVar.indexOf("=");
  if (eqIdx <= 0) {
    throw new ValidationError(`Invalid env format '${envVar}'. Expected KEY=VALUE`);
  }

  const key = envVar.slice(0, eqIdx);
  validateEnvVarKey(key);

  return { key, value: sanitizeEnvValue(envVar.slice(eqIdx + 1)) };
}

/**
 * Parse a port number. Non-root images cannot bind privileged ports,
 * so anything below 1024 is rejected.
 *
 * @throws ValidationError for non-integers and out-of-range values.
 */
export function parsePort(value: string | number): number {
  const port = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
    throw new ValidationError(`Invalid port '${value}'. Expected an integer between 1 and ${MAX_PORT}`);
  }
  if (port < MIN_UNPRIVILEGED_PORT) {
    throw new ValidationError(
      `Port ${port} is privileged. The runtime user is non-root and can only bind ports >= ${MIN_UNPRIVILEGED_PORT}`
    );
  }
  return port;
}

/**
 * Parse a port list ("9001, 9002 9003"). Duplicates are dropped, order is kept.
 */
export function parsePortList(value: string): number[] {
  const ports: number[] = [];
  for (const token of value.split(/[\s,]+/).filter(Boolean)) {
    const port = parsePort(token);
    if (!ports.includes(port)) {
      ports.push(port);
    }
  }
  return ports;
}

/**
 * Validate a uid/gid for the runtime identity. 0 is root and never allowed.
 *
 * @throws ValidationError if the id is not a positive integer.
 */
export function validateAccountId(id: number, kind: "uid" | "gid"): number {
  if (!Number.isInteger(id) || id < 1 || id > 2_147_483_647) {
    throw new ValidationError(`Invalid ${kind} '${id}'. Must be a positive integer (0 is root)`);
  }
  return id;
}

/** @throws ValidationError for invalid or privileged account names. */
export function validateAccountName(name: string, kind: "user" | "group"): string {
  if (!ACCOUNT_NAME_PATTERN.test(name)) {
    throw new ValidationError(`Invalid ${kind} name '${name}'. Use lower-case letters, digits, '_' or '-'`);
  }
  if (name === "root") {
    throw new ValidationError(`The runtime ${kind} must not be root`);
  }
  return name;
}

export function isValidImageReference(ref: string): boolean {
  return IMAGE_REF_PATTERN.test(ref);
}

/** @throws ValidationError if the reference is malformed. */
export function validateImageReference(ref: string, field: string): string {
  if (!isValidImageReference(ref)) {
    throw new ValidationError(`Invalid image reference for ${field}: '${ref}'`);
  }
  return ref;
}

/** @throws ValidationError if the path is not absolute or contains '..'. */
export function validateContainerPath(path: string, field: string): string {
  if (!path.startsWith("/") || path.split("/").includes("..")) {
    throw new ValidationError(`${field} must be an absolute container path without '..': '${path}'`);
  }
  return path.length > 1 ? path.replace(/\/+$/, "") : path;
}

/** @throws ValidationError if the path escapes its parent or is absolute. */
export function validateRelativePath(path: string, field: string): string {
  if (path === "" || path.startsWith("/") || path.split("/").includes("..")) {
    throw new ValidationError(`${field} must be a relative path inside the build context: '${path}'`);
  }
  return path;
}

/**
 * A file at the root of the build context. Manifests are copied flat into
 * the workdir, so a nested path would not exist where pip looks for it.
 */
export function validateContextRootFile(path: string, field: string): string {
  validateRelativePath(path, field);
  if (path.includes("/")) {
    throw new ValidationError(`${field} must be a file at the root of the build context: '${path}'`);
  }
  return path;
}

/** @throws ValidationError for malformed label keys. */
export function validateLabelKey(key: string): string {
  if (!LABEL_KEY_PATTERN.test(key)) {
    throw new ValidationError(`Invalid label key '${key}'`);
  }
  return key;
}
