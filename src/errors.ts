/**
 * Unified exception hierarchy for venvship.
 *
 * All custom exceptions inherit from VenvshipError for consistent error handling.
 * CLI catches these and converts to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other venvship modules.
 *   It should NOT import from any other venvship modules.
 */

/**
 * Base exception for all venvship errors.
 *
 * All venvship-specific exceptions should inherit from this class.
 * This enables consistent error handling at the CLI layer.
 */
export class VenvshipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VenvshipError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Invalid configuration values
 *   - Configuration file parse errors
 */
export class ConfigError extends VenvshipError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Build context path errors (missing, not a directory). */
export class PathError extends VenvshipError {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

/**
 * Input and plan validation errors.
 *
 * Examples:
 *   - Invalid port or numeric id
 *   - Cyclic step graph
 *   - Plan that breaks a build invariant
 */
export class ValidationError extends VenvshipError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Dependency manifest errors (unreadable manifest, missing lock file). */
export class ManifestError extends VenvshipError {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

/** Illegal pipeline state transition. */
export class PipelineStateError extends VenvshipError {
  constructor(message: string) {
    super(message);
    this.name = "PipelineStateError";
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all Docker-related exceptions.
 */
export class DockerError extends VenvshipError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when Docker is not installed or not in PATH. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Docker not found in PATH") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when a Docker operation times out. */
export class DockerTimeoutError extends DockerError {
  constructor(message = "Docker operation timed out") {
    super(message);
    this.name = "DockerTimeoutError";
  }
}

/** Raised when Docker daemon is not running. */
export class DockerNotRunningError extends DockerError {
  constructor(message = "Docker daemon is not running") {
    super(message);
    this.name = "DockerNotRunningError";
  }
}

/** Raised when the image pipeline fails. Carries the failing stage and step. */
export class ImageBuildError extends DockerError {
  readonly stage: string | undefined;
  readonly step: string | undefined;

  constructor(message: string, location: { stage?: string; step?: string } = {}) {
    super(message);
    this.name = "ImageBuildError";
    this.stage = location.stage;
    this.step = location.step;
  }
}

/** Read a field execa attaches to the errors it throws. */
function execaField(error: Error, key: "stderr" | "shortMessage"): unknown {
  const value: unknown = Reflect.get(error, key);
  return value;
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  const stderr = execaField(error, "stderr");
  const shortMessage = execaField(error, "shortMessage");

  if (typeof stderr === "string" && stderr) {
    return stderr.slice(0, maxLength);
  }
  if (typeof shortMessage === "string" && shortMessage) {
    return shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
