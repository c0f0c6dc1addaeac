/**
 * Recording logger for tests.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * Array.from(partition([1, 2, 3], 2, { logger }));
 *
 * expect(logger.messagesAt("DEBUG")).toEqual([
 *   "Partition emitted",
 *   "Partition emitted",
 *   "Source exhausted",
 * ]);
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";

/**
 * One recorded log event.
 */
export interface LogCall {
  level: LogLevel;
  message: string;
  /** undefined when the caller passed no data */
  data: UnknownRecord | undefined;
}

export interface MockLogger extends Logger {
  /** Every recorded event, oldest first */
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;
  messagesAt(level: LogLevel): string[];
}

export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({ level, message, data });
    };
  const getCallsAtLevel = (level: LogLevel): LogCall[] =>
    calls.filter((call) => call.level === level);

  return {
    calls,
    clear: () => {
      calls.length = 0;
    },
    getCallsAtLevel,
    messagesAt: (level) => getCallsAtLevel(level).map((call) => call.message),
    debug: record("DEBUG"),
    info: record("INFO"),
    warn: record("WARN"),
    error: record("ERROR"),
  };
}
