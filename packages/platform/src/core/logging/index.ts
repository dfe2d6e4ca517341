/**
 * Logging
 *
 * Structured JSON logging for platform code. One line per entry:
 * { level, context, message, ...data }. Warnings and errors are also
 * forwarded to the observability provider.
 */

import type { Logger } from "@keepsync/contracts";
import { captureMessage } from "../observability/index.js";

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(
          JSON.stringify({ level: "debug", context, message, ...data })
        );
      }
    },
  };
}

/** A logger that discards everything. Handy for tests and scripts. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};
