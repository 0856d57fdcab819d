/**
 * Build context path utilities.
 *
 * Dependency direction:
 *   This module has minimal internal dependencies (near-leaf module).
 *   It may be imported by: build.ts, cli.ts, pipeline/layer-keys.ts
 *   It should NOT import from: cli, build
 */

import { existsSync, lstatSync, readdirSync } from "node:fs";
import { join, relative, resolve, sep } from "node:path";

import { PathError } from "./errors.js";

/**
 * Validate and resolve a project path.
 *
 * @param path - Path to validate.
 * @returns Resolved absolute path.
 * @throws PathError if path doesn't exist or is not a directory.
 */
export function validateProjectPath(path: string): string {
  const projectPath = resolve(path);

  if (!existsSync(projectPath)) {
    throw new PathError(`Project path does not exist: ${projectPath}`);
  }

  const stats = lstatSync(projectPath);

  // Security: reject symlinks to prevent symlink-based path traversal
  if (stats.isSymbolicLink()) {
    throw new PathError(`Project path cannot be a symlink: ${projectPath}`);
  }

  if (!stats.isDirectory()) {
    throw new PathError(`Project path must be a directory: ${projectPath}`);
  }

  return projectPath;
}

/**
 * Compile a Docker-style path glob.
 *
 * `*` and `?` stay within one path segment, `**` spans segments. A pattern
 * matches a path and everything below it.
 */
export function globToRegExp(pattern: string): RegExp {
  const cleaned = pattern.replace(/^\.\//, "").replace(/\/+$/, "");
  if (cleaned === "" || cleaned === ".") {
    return /^.*$/;
  }
  let source = "";
  for (let i = 0; i < cleaned.length; i++) {
    const char = cleaned.charAt(i);
    if (char === "*" && cleaned.charAt(i + 1) === "*") {
      const slash = cleaned.charAt(i + 2) === "/";
      source += slash ? "(?:.*/)?" : ".*";
      i += slash ? 2 : 1;
    } else if (char === "*") {
      source += "[^/]*";
    } else if (char === "?") {
      source += "[^/]";
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}(?:/.*)?$`);
}

/** True when a context-relative path is matched by any pattern. */
export function matchesAny(path: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(path));
}

/**
 * List the files of a build context as sorted `/`-separated relative paths.
 *
 * Directories matched by an ignore pattern are not descended into.
 * Symlinks are listed, not followed.
 */
export function listContextFiles(contextDir: string, ignore: readonly string[] = []): string[] {
  const ignored = ignore.map(globToRegExp);
  const files: string[] = [];

  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      const rel = relative(contextDir, full).split(sep).join("/");
      if (matchesAny(rel, ignored)) {
        continue;
      }
      if (entry.isDirectory()) {
        walk(full);
      } else {
        files.push(rel);
      }
    }
  };

  walk(contextDir);
  return files.sort();
}
