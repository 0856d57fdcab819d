/**
 * `venvship verify`: check a built image against the runtime contract,
 * and optionally diff its frozen dependency set against another image.
 */

import { captureFreeze, compareFreeze, isIdenticalFreeze, verifyImage } from "../docker/inspect.js";
import { log, style } from "../logger.js";
import type { ProjectContext } from "./context.js";

export interface VerifyOptions {
  /** Second image whose `pip freeze` must match. */
  compare?: string;
}

export async function verify(ctx: ProjectContext, image: string, options: VerifyOptions = {}): Promise<number> {
  const report = await verifyImage(image, ctx.config);

  log.bold(`Runtime contract: ${image}`);
  for (const check of report.checks) {
    const mark = check.ok ? style.green("ok  ") : style.red("FAIL");
    const detail = check.ok ? check.actual : `expected ${check.expected}, got ${check.actual || "nothing"}`;
    log.raw(`  ${mark} ${check.name.padEnd(8)} ${detail}`);
  }

  let ok = report.ok;

  if (options.compare) {
    const diff = compareFreeze(await captureFreeze(image), await captureFreeze(options.compare));
    if (isIdenticalFreeze(diff)) {
      log.success(`Dependency sets of ${image} and ${options.compare} are identical`);
    } else {
      ok = false;
      log.error(`Dependency sets differ between ${image} and ${options.compare}:`);
      for (const line of diff.removed) {
        log.raw(`  ${style.red(`- ${line}`)}`);
      }
      for (const line of diff.added) {
        log.raw(`  ${style.green(`+ ${line}`)}`);
      }
    }
  }

  if (!ok) {
    return 1;
  }
  log.success("Verified");
  return 0;
}
