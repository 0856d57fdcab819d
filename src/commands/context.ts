/**
 * Shared project resolution for CLI commands.
 *
 * Merges config files with CLI flags (global < project < CLI) into a
 * validated pipeline config.
 */

import { basename } from "node:path";

import { createPipelineConfig, getImageName, type PipelineConfig } from "../config.js";
import { loadVenvshipConfig, mergeConfigs, toPipelineInput, type VenvshipFileConfig } from "../config-file.js";
import { validateProjectPath } from "../paths.js";
import { parseEnvVarStrict, parsePortList } from "../validation.js";

/** Options every command accepts (set on the root program). */
export type GlobalOptions = {
  path?: string;
  env?: string[];
  ports?: string;
};

export interface ProjectContext {
  projectPath: string;
  fileConfig: VenvshipFileConfig;
  config: PipelineConfig;
}

/** Turn repeated `-e KEY=VALUE` flags into a map; later keys win. */
export function envFlagsToRecord(flags: readonly string[] = []): Record<string, string> {
  const env: Record<string, string> = {};
  for (const flag of flags) {
    const { key, value } = parseEnvVarStrict(flag);
    env[key] = value;
  }
  return env;
}

/** Resolve the project directory, its config files and CLI overrides. */
export function loadProject(options: GlobalOptions): ProjectContext {
  const projectPath = validateProjectPath(options.path ?? ".");

  const cliConfig: VenvshipFileConfig = {};
  if (options.env && options.env.length > 0) {
    cliConfig.env = envFlagsToRecord(options.env);
  }
  if (options.ports) {
    cliConfig.ports = parsePortList(options.ports);
  }

  const fileConfig = mergeConfigs(loadVenvshipConfig(projectPath), cliConfig);
  const config = createPipelineConfig(toPipelineInput(fileConfig));
  return { projectPath, fileConfig, config };
}

/** Image name for a project: flags first, then config, then the directory name. */
export function resolveImageName(ctx: ProjectContext, flags: { name?: string; tag?: string } = {}): string {
  const name = flags.name ?? ctx.fileConfig.name ?? basename(ctx.projectPath);
  return getImageName(name, flags.tag ?? ctx.fileConfig.tag);
}
