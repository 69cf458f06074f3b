/**
 * Debug Logging
 *
 * Lines are written as `[unionerr:<scope>] <message>` and only when the
 * `debug` configuration flag is on. The writer defaults to `console.error`
 * and can be replaced, e.g. to capture output in tests.
 */

import { config } from "./config.js";

/** A sink for rendered log lines. */
export type LogWriter = (line: string) => void;

const defaultWriter: LogWriter = (line: string) => console.error(line);

let writer: LogWriter = defaultWriter;

/**
 * Replace the writer used by {@link debugLog}. Pass nothing to restore
 * `console.error`.
 */
export function setLogWriter(next?: LogWriter): void {
  writer = next ?? defaultWriter;
}

/**
 * Format a log line for a scope.
 */
export function formatLogLine(scope: string, message: string): string {
  return `[unionerr:${scope}] ${message}`;
}

/**
 * Write a debug line when `debug` is enabled. The message may be given
 * lazily so that disabled logging costs nothing.
 */
export function debugLog(scope: string, message: string | (() => string)): void {
  if (!config.has("debug")) return;
  writer(formatLogLine(scope, typeof message === "function" ? message() : message));
}
