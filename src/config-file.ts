/**
 * Configuration file support for venvship.
 *
 * Loads settings from venvship.yaml or .venvshiprc files.
 * Supports both per-project and global configuration.
 *
 * Config file locations (in order of precedence):
 *   1. ./venvship.yaml (project-specific)
 *   2. ./venvship.yml, ./.venvshiprc (project-specific, alternatives)
 *   3. ~/.venvship/config.yaml (global)
 *
 * Dependency direction:
 *   This module imports from: logger.ts, config.ts, errors.ts, validation.ts
 *   It should NOT import from: cli, build, pipeline
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import type { PipelineConfigInput, ProgressMode } from "./config.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import { parsePortList } from "./validation.js";

/**
 * venvship configuration file options.
 * All fields are optional - CLI flags take precedence.
 */
export interface VenvshipFileConfig {
  // Image naming
  name?: string;
  tag?: string;

  // Stages
  builderImage?: string;
  runtimeImage?: string;
  workdir?: string;
  venvDir?: string;

  // Runtime identity
  user?: string;
  group?: string;
  uid?: number;
  gid?: number;

  // Contract
  ports?: number[];
  portLabels?: Record<number, string>;
  command?: string[];

  // Dependencies
  requirements?: string;
  systemPackages?: string[];
  installerUrl?: string;

  // Docker
  progress?: ProgressMode;
  cache?: boolean;
  pull?: boolean;
  preflight?: boolean;
  verify?: boolean;
  buildTimeout?: number;

  // Runtime environment and metadata
  env?: Record<string, string>;
  labels?: Record<string, string>;
}

const PROJECT_CONFIG_FILES = ["venvship.yaml", "venvship.yml", ".venvshiprc"];

/** Global config path (resolved lazily so HOME overrides apply). */
function getGlobalConfigPath(): string {
  return join(homedir(), ".venvship", "config.yaml");
}

/** Indented map blocks the simple parser understands. */
const BLOCK_KEYS = new Set(["env", "labels", "portLabels"]);

type ParsedValue = string | number | boolean | Record<string, string>;

function unquote(value: string): string {
  return value.trim().replace(/^["']|["']$/g, "").trim();
}

/**
 * Parse YAML-like config (simple key: value format).
 * Supports scalars plus indented `env:`, `labels:` and `portLabels:` blocks.
 */
export function parseSimpleYaml(content: string): Record<string, ParsedValue> {
  const result: Record<string, ParsedValue> = {};
  let block: { key: string; entries: Record<string, string> } | null = null;

  const closeBlock = (): void => {
    if (block && Object.keys(block.entries).length > 0) {
      result[block.key] = block.entries;
    }
    block = null;
  };

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    const indented = /^\s+/.test(line);
    if (block && indented) {
      const entry = trimmed.match(/^["']?([A-Za-z0-9_.-]+)["']?:\s*(.*)$/);
      const entryKey = entry?.[1];
      const entryValue = entry?.[2];
      if (entryKey !== undefined && entryValue !== undefined) {
        block.entries[entryKey] = unquote(entryValue);
      }
      continue;
    }
    closeBlock();

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    const key = match?.[1];
    const rawValue = match?.[2];
    if (key === undefined || rawValue === undefined) {
      continue;
    }

    if (BLOCK_KEYS.has(key) && rawValue.trim() === "") {
      block = { key, entries: {} };
      continue;
    }

    // Array literals stay verbatim (command: ["python", "main.py"])
    if (rawValue.trim().startsWith("[")) {
      result[key] = rawValue.trim();
      continue;
    }

    const cleanValue = unquote(rawValue);
    if (cleanValue === "true") {
      result[key] = true;
    } else if (cleanValue === "false") {
      result[key] = false;
    } else if (/^\d+$/.test(cleanValue)) {
      result[key] = parseInt(cleanValue, 10);
    } else if (cleanValue !== "") {
      result[key] = cleanValue;
    }
  }
  closeBlock();

  return result;
}

/** Split a list value: JSON array, or comma/space separated words. */
function parseList(value: ParsedValue, key: string): string[] {
  if (typeof value === "number") {
    return [String(value)];
  }
  if (typeof value !== "string") {
    throw new ConfigError(`'${key}' must be a list`);
  }
  if (value.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      throw new ConfigError(`'${key}' is not a valid JSON array: ${value}`);
    }
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
      throw new ConfigError(`'${key}' must be an array of strings`);
    }
    return parsed;
  }
  return value.split(/[\s,]+/).filter(Boolean);
}

function isStringMap(value: ParsedValue | undefined): value is Record<string, string> {
  return typeof value === "object" && value !== null;
}

export const PROGRESS_MODES: readonly ProgressMode[] = ["auto", "plain", "tty"];

export function isProgressMode(value: string): value is ProgressMode {
  return PROGRESS_MODES.some((mode) => mode === value);
}

/** Map parsed values onto VenvshipFileConfig, rejecting malformed fields. */
export function toFileConfig(parsed: Record<string, ParsedValue>): VenvshipFileConfig {
  const config: VenvshipFileConfig = {};

  const str = (key: string): string | undefined => {
    const value = parsed[key];
    if (value === undefined) {return undefined;}
    if (typeof value === "string") {return value;}
    if (typeof value === "number") {return String(value);}
    throw new ConfigError(`'${key}' must be a string`);
  };
  const num = (key: string): number | undefined => {
    const value = parsed[key];
    if (value === undefined) {return undefined;}
    if (typeof value === "number") {return value;}
    throw new ConfigError(`'${key}' must be an integer`);
  };
  const bool = (key: string): boolean | undefined => {
    const value = parsed[key];
    if (value === undefined) {return undefined;}
    if (typeof value === "boolean") {return value;}
    throw new ConfigError(`'${key}' must be true or false`);
  };

  const set = <K extends keyof VenvshipFileConfig>(key: K, value: VenvshipFileConfig[K]): void => {
    if (value !== undefined) {
      config[key] = value;
    }
  };

  set("name", str("name"));
  set("tag", str("tag"));
  set("builderImage", str("builderImage"));
  set("runtimeImage", str("runtimeImage"));
  set("workdir", str("workdir"));
  set("venvDir", str("venvDir"));
  set("user", str("user"));
  set("group", str("group"));
  set("uid", num("uid"));
  set("gid", num("gid"));
  set("requirements", str("requirements"));
  set("installerUrl", str("installerUrl"));
  set("cache", bool("cache"));
  set("pull", bool("pull"));
  set("preflight", bool("preflight"));
  set("verify", bool("verify"));
  set("buildTimeout", num("buildTimeout"));

  const progress = str("progress");
  if (progress !== undefined) {
    if (!isProgressMode(progress)) {
      throw new ConfigError(`'progress' must be one of ${PROGRESS_MODES.join(", ")}`);
    }
    config.progress = progress;
  }

  if (parsed.ports !== undefined) {
    config.ports = parsePortList(parseList(parsed.ports, "ports").join(","));
  }
  if (parsed.systemPackages !== undefined) {
    config.systemPackages = parseList(parsed.systemPackages, "systemPackages");
  }
  if (parsed.command !== undefined) {
    config.command = parseList(parsed.command, "command");
  }

  const env = parsed.env;
  if (isStringMap(env)) {config.env = env;}
  const labels = parsed.labels;
  if (isStringMap(labels)) {config.labels = labels;}
  const portLabels = parsed.portLabels;
  if (isStringMap(portLabels)) {
    const mapped: Record<number, string> = {};
    for (const [port, description] of Object.entries(portLabels)) {
      const [parsedPort] = parsePortList(port);
      if (parsedPort !== undefined) {
        mapped[parsedPort] = description;
      }
    }
    config.portLabels = mapped;
  }

  return config;
}

/**
 * Load configuration from file.
 *
 * Returns null when the file does not exist. A file that exists but is
 * malformed is an error: a silently ignored setting could ship a root image.
 */
export function loadConfigFile(path: string): VenvshipFileConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Failed to read config file ${path}: ${String(e)}`);
  }

  try {
    return toFileConfig(parseSimpleYaml(content));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Invalid config file ${path}: ${message}`);
  }
}

function loadProjectConfig(projectPath: string): VenvshipFileConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

function loadGlobalConfig(): VenvshipFileConfig | null {
  const path = getGlobalConfigPath();
  const config = loadConfigFile(path);
  if (config) {
    log.debug(`Loaded global config: ${path}`);
  }
  return config;
}

/**
 * Merge configurations with proper precedence.
 * Order: global < project < CLI flags
 */
export function mergeConfigs(...configs: (VenvshipFileConfig | null)[]): VenvshipFileConfig {
  const result: VenvshipFileConfig = {};

  for (const config of configs) {
    if (!config) {continue;}

    const { env, labels, portLabels, ...scalars } = config;
    Object.assign(result, scalars);

    // Maps: merge (later overrides same keys)
    if (env) {result.env = { ...(result.env ?? {}), ...env };}
    if (labels) {result.labels = { ...(result.labels ?? {}), ...labels };}
    if (portLabels) {result.portLabels = { ...(result.portLabels ?? {}), ...portLabels };}
  }

  return result;
}

/**
 * Load venvship configuration.
 *
 * Loads and merges configuration from:
 *   1. Global config (~/.venvship/config.yaml)
 *   2. Project config (./venvship.yaml, ./venvship.yml, ./.venvshiprc)
 *
 * CLI flags should be applied on top of the returned config.
 */
export function loadVenvshipConfig(projectPath: string): VenvshipFileConfig {
  return mergeConfigs(loadGlobalConfig(), loadProjectConfig(projectPath));
}

/** Extract the pipeline-shaping part of a file config. */
export function toPipelineInput(config: VenvshipFileConfig): PipelineConfigInput {
  const input: PipelineConfigInput = {
    builderImage: config.builderImage,
    runtimeImage: config.runtimeImage,
    workdir: config.workdir,
    venvDir: config.venvDir,
    user: config.user,
    group: config.group,
    uid: config.uid,
    gid: config.gid,
    ports: config.ports,
    portLabels: config.portLabels,
    requirements: config.requirements,
    systemPackages: config.systemPackages,
    installerUrl: config.installerUrl,
    env: config.env,
    labels: config.labels,
    command: config.command,
  };
  return input;
}
