/**
 * Scoped line logger.
 *
 * Every line is prefixed with `[pegcode:<scope>]`. Debug lines are dropped
 * unless the logger is verbose.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  readonly scope: string;
  readonly verbose: boolean;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger for a nested scope, e.g. `generator` → `generator:rules`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Emit debug lines (default: config `verbose`) */
  verbose?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string, level: LogLevel) => void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? config.resolved().verbose;
  const writer = options.writer ?? ((line: string) => console.error(line));

  const write = (level: LogLevel, message: string): void => {
    if (level === "debug" && !verbose) return;
    const tag = level === "info" || level === "debug" ? "" : ` ${level}:`;
    writer(`[pegcode:${scope}]${tag} ${message}`, level);
  };

  return {
    scope,
    verbose,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    child: (sub) => createLogger(`${scope}:${sub}`, { verbose, writer }),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger("silent", {
  verbose: false,
  writer: () => undefined,
});
