/**
 * Unified logging abstraction for venvship.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All venvship output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix messages with [venvship] */
  prefix: boolean;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
  quiet: false,
};

/** Console sinks. Swappable so tests can capture output. */
export interface LogSink {
  out(message: string): void;
  err(message: string): void;
}

const consoleSink: LogSink = {
  out: (message) => console.log(message),
  err: (message) => console.error(message),
};

let sink: LogSink = consoleSink;

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/** Disable quiet mode and restore the default level. */
export function disableQuietMode(): void {
  config.quiet = false;
  config.level = LogLevel.INFO;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/** Enable or disable the [venvship] prefix on all messages. */
export function setPrefix(enabled: boolean): void {
  config.prefix = enabled;
}

/** Redirect output (tests). Pass nothing to restore the console. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

function formatMessage(message: string): string {
  return config.prefix ? `[venvship] ${message}` : message;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 */
export const log = {
  /** Debug-level message, dim. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      sink.out(pc.dim(formatMessage(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out(formatMessage(message));
    }
  },

  /** Warning, yellow on stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      sink.err(pc.yellow(formatMessage(message)));
    }
  },

  /** Error, red on stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      sink.err(pc.red(formatMessage(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out(pc.green(formatMessage(message)));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out(pc.dim(formatMessage(message)));
    }
  },

  bold(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out(pc.bold(formatMessage(message)));
    }
  },

  yellow(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out(pc.yellow(formatMessage(message)));
    }
  },

  /** Raw output without styling or prefix (info level). */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out(message);
    }
  },

  newline(): void {
    if (canOutput(LogLevel.INFO)) {
      sink.out("");
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 *
 * Usage:
 *   log.raw(`${style.green("ok")} - ${style.dim("details")}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
  red: (text: string) => pc.red(text),
  green: (text: string) => pc.green(text),
  yellow: (text: string) => pc.yellow(text),
  cyan: (text: string) => pc.cyan(text),
  cyanBold: (text: string) => pc.bold(pc.cyan(text)),
};
