/**
 * Logging Types
 *
 * Library code never writes output on its own: components accept an
 * optional `Logger` and default to `createNoOpLogger()`. The interface is a
 * subset of the runtime console, so `console` itself (or any structured
 * logger with the same four methods) can be passed in.
 */

import type { UnknownRecord } from "../types.js";

/**
 * Log level, most verbose first.
 */
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

/**
 * Sink for structured log events.
 *
 * @example
 * ```typescript
 * const iterator = partition(rows, 100, { logger: console });
 * // console.debug("Partition emitted", { index: 0, size: 100 })
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

const discard = (): void => {};

/**
 * Logger that drops every event. The default wherever a logger is optional.
 */
export function createNoOpLogger(): Logger {
  return { debug: discard, info: discard, warn: discard, error: discard };
}
