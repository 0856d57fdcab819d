#!/usr/bin/env node
/**
 * CLI entry point for venvship.
 *
 * Commander.js-based CLI with all commands and options.
 */

import { Command, InvalidArgumentError, Option } from "commander";

import { build, type BuildCommandOptions } from "./commands/build.js";
import { check } from "./commands/check.js";
import { type GlobalOptions, loadProject } from "./commands/context.js";
import { plan } from "./commands/plan.js";
import { render, type RenderOptions } from "./commands/render.js";
import { verify, type VerifyOptions } from "./commands/verify.js";
import { isProgressMode, PROGRESS_MODES } from "./config-file.js";
import type { ProgressMode } from "./config.js";
import { VERSION } from "./constants.js";
import { handleCliError } from "./error-handler.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";
import { parseEnvVarStrict } from "./validation.js";

type RootOptions = GlobalOptions & {
  quiet?: boolean;
  debug?: boolean;
  chdir?: string;
};

/** Run a command body, mapping its result to the exit code. */
async function execute(body: () => Promise<number> | number): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (error: unknown) {
    handleCliError(error);
  }
}

function parseProgress(value: string): ProgressMode {
  if (!isProgressMode(value)) {
    throw new InvalidArgumentError(`Expected one of ${PROGRESS_MODES.join(", ")}.`);
  }
  return value;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return seconds;
}

function collectEnv(value: string, previous: string[]): string[] {
  // Validate format and key (throws ValidationError on invalid input)
  parseEnvVarStrict(value);
  return [...previous, value];
}

const program = new Command();

program
  .name("venvship")
  .description("Build two-stage, non-root container images for Python services")
  .version(VERSION)
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .option("-d, --debug", "Show debug output, including raw BuildKit progress")
  .option("-C, --chdir <dir>", "Change to directory before running (like git -C)")
  .option("--path <dir>", "Build context (project) path", ".")
  .option("-e, --env <KEY=VALUE>", "Extra runtime environment variable (repeatable)", collectEnv, [])
  .option("--ports <list>", "Ports to expose, comma or space separated (default: 9001-9004)")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<RootOptions>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.debug) {
      setLogLevel(LogLevel.DEBUG);
    }
    // Change directory if --chdir/-C specified (like git -C)
    if (opts.chdir) {
      process.chdir(opts.chdir);
    }
  });

program
  .command("render")
  .description("Print the generated Dockerfile")
  .option("-o, --output <file>", "Write to a file (plus <file>.dockerignore)")
  .action((options: RenderOptions, command: Command) =>
    execute(() => render(loadProject(command.optsWithGlobals<GlobalOptions>()), options))
  );

program
  .command("plan")
  .description("Show stages, steps, reached states and layer cache keys")
  .action((_options: unknown, command: Command) =>
    execute(() => plan(loadProject(command.optsWithGlobals<GlobalOptions>())))
  );

program
  .command("check")
  .description("Check build invariants and the build context without building")
  .action((_options: unknown, command: Command) =>
    execute(() => check(loadProject(command.optsWithGlobals<GlobalOptions>())))
  );

program
  .command("build")
  .description("Build the image (builder stage, then runtime stage)")
  .option("-n, --name <name>", "Image name (default: config name or directory name)")
  .option("-t, --tag <tag>", "Image tag (default: latest)")
  .addOption(
    new Option("--progress <mode>", `BuildKit output (${PROGRESS_MODES.join("|")}); plain echoes every line`).argParser(
      parseProgress
    )
  )
  .option("--no-cache", "Disable Docker build cache")
  .option("--pull", "Always pull newer base images")
  .option("--no-preflight", "Skip the local build context check")
  .option("--verify", "Verify the runtime contract after building")
  .option("--build-timeout <seconds>", "Per-stage build timeout (0 disables)", parseSeconds)
  .action((options: BuildCommandOptions, command: Command) =>
    execute(() => build(loadProject(command.optsWithGlobals<GlobalOptions>()), options))
  );

program
  .command("verify")
  .description("Verify a built image: identity, workdir, ports, PATH, interpreter")
  .argument("<image>", "Image to verify")
  .option("--compare <image>", "Also require an identical pip freeze with this image")
  .action((image: string, options: VerifyOptions, command: Command) =>
    execute(() => verify(loadProject(command.optsWithGlobals<GlobalOptions>()), image, options))
  );

program.parseAsync().catch(handleCliError);
