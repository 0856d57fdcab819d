/**
 * CLI error reporting for venvship.
 *
 * Explains build step exit codes and turns venvship errors into one-line
 * messages at the CLI boundary.
 */

import { ImageBuildError, VenvshipError } from "./errors.js";
import { log } from "./logger.js";

/** Known exit codes of build steps and probes. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "Step command failed",
    suggestion: "Re-run with --progress plain to see the full step output",
    severity: "error",
  },
  2: {
    code: 2,
    name: "MISUSE",
    description: "Shell builtin misuse or invalid arguments",
    suggestion: "Check the step command syntax",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Command not executable",
    suggestion: "Check file permissions in the image",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found",
    suggestion: "Check that the tool is installed by an earlier step and on PATH",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "KILLED",
    description: "Step was killed (out of memory or manual stop)",
    suggestion: "Give the Docker daemon more memory for native dependency builds",
    severity: "warn",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Terminated by signal",
    severity: "info",
  },
};

export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Unknown exit code ${code}`,
      severity: "warn",
    }
  );
}

/** SIGINT or SIGTERM: the user stopped it, not a failure to explain. */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143;
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }
  const info = getExitCodeInfo(code);

  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const contextStr = context ? ` (${context})` : "";
  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Report an error and exit with status 1.
 *
 * venvship errors print their message only; anything else is unexpected
 * and prints its stack at debug level.
 */
export function handleCliError(error: unknown): never {
  if (error instanceof VenvshipError) {
    log.error(`Error: ${error.message}`);
    if (error instanceof ImageBuildError && error.step) {
      log.dim(`Failed step: ${error.stage ?? "?"}/${error.step}`);
    }
  } else {
    log.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
  process.exit(1);
}
