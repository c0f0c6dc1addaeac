/**
 * Shared foundations for the ordkit packages: type aliases, pluggable
 * logging and coded errors.
 *
 * @example
 * ```typescript
 * import { ToolkitError, createNoOpLogger, type Nullable } from "@ordkit/core";
 *
 * const logger = createNoOpLogger();
 * logger.info("Ready");
 * ```
 *
 * @module @ordkit/core
 */

// Types
export type { UnknownRecord, Nullable } from "./types.js";
export { isAbsent } from "./types.js";

// Logging
export type { Logger, LogLevel, LogCall, MockLogger } from "./logging/index.js";
export { createNoOpLogger, createMockLogger } from "./logging/index.js";

// Errors
export { ToolkitError, describeValue } from "./errors/index.js";
