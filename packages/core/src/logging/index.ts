/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createNoOpLogger, type Logger } from "@ordkit/core";
 *
 * const logger: Logger = options.logger ?? createNoOpLogger();
 * logger.debug("Partition emitted", { index: 0, size: 3 });
 * ```
 */

export type { Logger, LogLevel } from "./types.js";
export { createNoOpLogger } from "./types.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";
