/**
 * Docker command execution with consistent error handling.
 *
 * Core execution layer - all Docker commands flow through safeDockerRun or
 * streamDockerRun.
 */

import { execa } from "execa";

import { DOCKER_COMMAND_TIMEOUT } from "../constants.js";
import { DockerNotFoundError, DockerTimeoutError } from "../errors.js";
import { log } from "../logger.js";

/** Result of a Docker command execution */
export interface DockerResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Environment for docker invocations: BuildKit always on. */
export function getDockerEnv(): NodeJS.ProcessEnv {
  return { ...process.env, DOCKER_BUILDKIT: "1" };
}

function describe(args: readonly string[]): string {
  return `docker ${args.slice(0, 3).join(" ")}...`;
}

/** Map spawn and timeout failures onto the Docker error types. */
function raiseForSpawnFailure(result: { timedOut: boolean }, args: readonly string[], timeout: number): void {
  const code = "code" in result ? result.code : undefined;
  if (code === "ENOENT") {
    throw new DockerNotFoundError(`Docker not found in PATH. Command: ${describe(args)}`);
  }
  if (result.timedOut) {
    throw new DockerTimeoutError(`Docker command timed out after ${timeout}ms. Command: ${describe(args)}`);
  }
}

/**
 * Run a Docker command with consistent error handling.
 *
 * @param args - Command arguments (without 'docker' prefix).
 * @returns Docker command result.
 * @throws DockerNotFoundError if docker command is not found.
 * @throws DockerTimeoutError if command times out.
 */
export async function safeDockerRun(args: string[], options: { timeout?: number } = {}): Promise<DockerResult> {
  const timeout = options.timeout ?? DOCKER_COMMAND_TIMEOUT;

  const result = await execa("docker", args, {
    timeout,
    env: getDockerEnv(),
    reject: false,
    encoding: "utf8",
  });
  raiseForSpawnFailure(result, args, timeout);

  return {
    exitCode: result.exitCode ?? 1,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

/**
 * Run a long Docker command, handing each combined output line to `onLine`.
 *
 * A timeout of 0 disables the limit. Aborting `signal` terminates docker.
 *
 * @returns Exit code; a cancelled run reports 130.
 */
export async function streamDockerRun(
  args: string[],
  onLine: (line: string) => void,
  options: { timeout?: number; signal?: AbortSignal } = {}
): Promise<{ exitCode: number; cancelled: boolean }> {
  const timeout = options.timeout ?? 0;

  const subprocess = execa("docker", args, {
    timeout,
    cancelSignal: options.signal,
    env: getDockerEnv(),
    reject: false,
    all: true,
    buffer: false,
  });

  let iterationError: unknown;
  try {
    for await (const line of subprocess.iterable({ from: "all" })) {
      onLine(line);
    }
  } catch (e) {
    iterationError = e;
  }

  const result = await subprocess;
  raiseForSpawnFailure(result, args, timeout);

  if (result.isCanceled) {
    return { exitCode: 130, cancelled: true };
  }
  if (iterationError !== undefined && !result.failed) {
    throw iterationError;
  }
  return { exitCode: result.exitCode ?? 1, cancelled: false };
}

/**
 * Check if Docker daemon is responsive.
 *
 * @returns True if Docker is running and responsive, false otherwise.
 */
export async function checkDockerStatus(): Promise<boolean> {
  try {
    const result = await safeDockerRun(["info"]);
    return result.exitCode === 0;
  } catch (error) {
    log.debug(`docker info failed: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

/**
 * Remove an image tag.
 *
 * @returns True if removed (or already absent).
 */
export async function removeImage(image: string, force = false): Promise<boolean> {
  const args = force ? ["rmi", "-f", image] : ["rmi", image];
  const result = await safeDockerRun(args);
  if (result.exitCode !== 0 && !/No such image/i.test(result.stderr)) {
    log.debug(`Failed to remove ${image}: ${result.stderr.trim()}`);
    return false;
  }
  return true;
}
