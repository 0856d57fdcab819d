/**
 * `venvship build`: run the pipeline through Docker BuildKit.
 */

import { buildServiceImage } from "../build.js";
import type { ProgressMode } from "../config.js";
import { DOCKER_BUILD_TIMEOUT } from "../constants.js";
import { checkDockerStatus } from "../docker/executor.js";
import { DockerNotRunningError } from "../errors.js";
import { log } from "../logger.js";
import { type ProjectContext, resolveImageName } from "./context.js";

export interface BuildCommandOptions {
  name?: string;
  tag?: string;
  progress?: ProgressMode;
  /** commander sets false for --no-cache. */
  cache?: boolean;
  pull?: boolean;
  /** commander sets false for --no-preflight. */
  preflight?: boolean;
  verify?: boolean;
  /** Seconds; 0 disables the limit. */
  buildTimeout?: number;
}

/** Flags override the config file; defaults apply last. */
export function resolveBuildSettings(ctx: ProjectContext, options: BuildCommandOptions) {
  const file = ctx.fileConfig;
  const timeoutSeconds = options.buildTimeout ?? file.buildTimeout;
  return {
    image: resolveImageName(ctx, { name: options.name, tag: options.tag }),
    progress: options.progress ?? file.progress ?? "auto",
    // commander defaults negatable flags to true, so only an explicit false counts
    cache: options.cache === false ? false : (file.cache ?? true),
    pull: options.pull ?? file.pull ?? false,
    preflight: options.preflight === false ? false : (file.preflight ?? true),
    verify: options.verify ?? file.verify ?? false,
    timeout: timeoutSeconds === undefined ? DOCKER_BUILD_TIMEOUT : timeoutSeconds * 1000,
  };
}

export async function build(ctx: ProjectContext, options: BuildCommandOptions = {}): Promise<number> {
  if (!(await checkDockerStatus())) {
    throw new DockerNotRunningError("Docker is not running. Start Docker and try again.");
  }

  const settings = resolveBuildSettings(ctx, options);
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn("Cancelling build...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    await buildServiceImage(ctx.projectPath, ctx.config, { ...settings, signal: controller.signal });
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
  return 0;
}
