/**
 * Structured Logging
 *
 * One JSON line per entry, written to the console. Warnings and errors
 * are also forwarded to the observability provider.
 */

import type { Logger } from "@dualmap/contracts";
import type { LogLevel } from "../config/index.js";
import { captureMessage } from "../observability/index.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Creates a structured logger.
 * Prefixes all entries with a context identifier and drops entries
 * below `level`.
 */
export function createLogger(context: string, level: LogLevel = "info"): Logger {
  const enabled = (entryLevel: LogLevel) => LEVEL_RANK[entryLevel] >= LEVEL_RANK[level];

  return {
    info(message, data) {
      if (!enabled("info")) return;
      console.log(JSON.stringify({ level: "info", context, message, ...data }));
    },
    warn(message, data) {
      if (!enabled("warn")) return;
      console.warn(JSON.stringify({ level: "warn", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(JSON.stringify({ level: "error", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (!enabled("debug")) return;
      console.debug(JSON.stringify({ level: "debug", context, message, ...data }));
    },
  };
}

/** A logger that discards every entry */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};
