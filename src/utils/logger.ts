/**
 * @fileoverview Console logger with level filtering.
 *
 * @license Apache-2.0
 */

import type { LogLevel } from "../config";

/**
 * Minimal logging surface handed to services and middleware.
 */
export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  error: (message: string, err?: unknown) => void;
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  error: 30,
  silent: Number.POSITIVE_INFINITY,
};

/**
 * Creates a logger writing to the console, dropping messages below `level`.
 *
 * @example
 * const log = createLogger("info");
 * log.debug("hidden");
 * log.info("[p1] - Listing apps");
 */
export function createLogger(level: LogLevel): Logger {
  const threshold = SEVERITY[level];
  const enabled = (l: Exclude<LogLevel, "silent">) => SEVERITY[l] >= threshold;

  return {
    debug: (message) => {
      if (enabled("debug")) console.debug(message);
    },
    info: (message) => {
      if (enabled("info")) console.log(message);
    },
    error: (message, err) => {
      if (!enabled("error")) return;
      if (err === undefined) console.error(message);
      else console.error(message, err);
    },
  };
}
