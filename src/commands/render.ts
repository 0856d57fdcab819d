/**
 * `venvship render`: print or write the generated Dockerfile.
 */

import { writeFileSync } from "node:fs";

import { preparePlan } from "../build.js";
import { renderDockerfile, renderDockerignore } from "../dockerfile-gen.js";
import { log } from "../logger.js";
import type { ProjectContext } from "./context.js";

export interface RenderOptions {
  /** Write to this file (plus `<file>.dockerignore`) instead of stdout. */
  output?: string;
}

export function render(ctx: ProjectContext, options: RenderOptions = {}): number {
  const plan = preparePlan(ctx.projectPath, ctx.config);
  const dockerfile = renderDockerfile(plan);

  if (!options.output) {
    log.raw(dockerfile.trimEnd());
    return 0;
  }

  writeFileSync(options.output, dockerfile, { encoding: "utf-8" });
  writeFileSync(`${options.output}.dockerignore`, renderDockerignore(ctx.config), { encoding: "utf-8" });
  log.success(`Wrote ${options.output} and ${options.output}.dockerignore`);
  return 0;
}
