/**
 * Dependency manifest detection for venvship.
 *
 * Finds the requirements manifest, project descriptor and lock file in a
 * build context and hashes them for the manifest-hash image label.
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";

import type { PipelineConfig } from "./config.js";
import { LOCK_FILE, PROJECT_DESCRIPTOR } from "./constants.js";
import { ManifestError } from "./errors.js";

/** Role a manifest file plays in dependency installation. */
export type ManifestRole = "requirements" | "descriptor" | "lock";

/** One manifest file the builder copies before the source tree. */
export interface ManifestFile {
  readonly role: ManifestRole;
  readonly path: string; // Relative to the build context
  readonly present: boolean;
}

/** What the build context offers for dependency installation. */
export interface ManifestSet {
  readonly files: readonly ManifestFile[];
  readonly hasRequirements: boolean;
  readonly hasDescriptor: boolean;
  readonly hasLock: boolean;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Manifest files in copy order: requirements, descriptor, lock.
 */
export function manifestPaths(config: PipelineConfig): { role: ManifestRole; path: string }[] {
  return [
    { role: "requirements", path: config.requirements },
    { role: "descriptor", path: PROJECT_DESCRIPTOR },
    { role: "lock", path: LOCK_FILE },
  ];
}

/**
 * Detect which manifest files exist in a build context.
 *
 * Every file is optional here; whether an absent one is fatal is decided
 * by the step that consumes it.
 *
 * @param contextDir - Build context root.
 */
export function detectManifests(contextDir: string, config: PipelineConfig): ManifestSet {
  const files = manifestPaths(config).map(({ role, path }) =>
    Object.freeze({ role, path, present: isFile(join(contextDir, path)) })
  );
  const has = (role: ManifestRole) => files.some((f) => f.role === role && f.present);

  return Object.freeze({
    files: Object.freeze(files),
    hasRequirements: has("requirements"),
    hasDescriptor: has("descriptor"),
    hasLock: has("lock"),
  });
}

/**
 * Compute a stable hash of the manifest files for the image label.
 *
 * Absent files contribute a fixed marker so adding one changes the hash.
 *
 * @returns Hex hash string (first 16 chars of SHA-256).
 */
export function computeManifestHash(contextDir: string, manifests: ManifestSet): string {
  const hash = createHash("sha256");

  const ordered = [...manifests.files].sort((a, b) => a.path.localeCompare(b.path));
  for (const file of ordered) {
    if (!file.present) {
      hash.update(`${file.path}\n<missing>\n`);
      continue;
    }
    try {
      hash.update(`${file.path}\n${readFileSync(join(contextDir, file.path), "utf-8")}\n`);
    } catch (e) {
      throw new ManifestError(`Failed to read manifest ${file.path}: ${String(e)}`);
    }
  }

  return hash.digest("hex").slice(0, 16);
}

/** Requirement lines that reference other files or options, not packages. */
const OPTION_LINE = /^-/;

/**
 * List requirement lines that do not pin an exact version.
 *
 * Only `==` and `===` pins (or direct URL references) are reproducible.
 * Comments, blank lines, options (-r, -c, --index-url) are ignored.
 */
export function findUnpinnedRequirements(content: string): string[] {
  const unpinned: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+#.*$/, "").trim();
    if (line === "" || line.startsWith("#") || OPTION_LINE.test(line)) {
      continue;
    }
    const spec = line.split(";")[0]?.trim() ?? "";
    const exactPin = /===?(?!=)/.test(spec) && !/[<>~!]=/.test(spec) && !spec.includes(",");
    if (exactPin || spec.includes(" @ ")) {
      continue;
    }
    unpinned.push(spec);
  }
  return unpinned;
}

/**
 * Read the requirements manifest and return its unpinned entries.
 * Returns an empty list when the manifest is absent.
 */
export function checkRequirementPins(contextDir: string, config: PipelineConfig): string[] {
  const path = join(contextDir, config.requirements);
  if (!existsSync(path)) {
    return [];
  }
  try {
    return findUnpinnedRequirements(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ManifestError(`Failed to read ${config.requirements}: ${String(e)}`);
  }
}
