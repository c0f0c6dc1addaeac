import type { UnknownRecord } from "../types.js";

/**
 * Base error class for every ordkit failure.
 *
 * Each package derives its own class through `forContext` so callers can
 * branch on `instanceof` or on the string `code`.
 *
 * @example
 * ```typescript
 * export const CollectionErrorCodes = {
 *   INVALID_PARTITION_SIZE: "INVALID_PARTITION_SIZE",
 * } as const;
 * export type CollectionErrorCode =
 *   (typeof CollectionErrorCodes)[keyof typeof CollectionErrorCodes];
 *
 * export const CollectionError = ToolkitError.forContext<CollectionErrorCode>("Collection");
 *
 * throw new CollectionError("INVALID_PARTITION_SIZE", "Partition size must be >= 1", { size: 0 });
 * ```
 */
export class ToolkitError<TCode extends string = string> extends Error {
  /**
   * Error code for programmatic handling.
   */
  public readonly code: TCode;

  /**
   * Offending values and other debugging details.
   */
  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "ToolkitError";
  }

  /**
   * Create a package-specific error subclass named `${contextName}Error`.
   */
  static forContext<TCode extends string>(
    contextName: string
  ): new (code: TCode, message: string, context?: UnknownRecord) => ToolkitError<TCode> {
    const ContextError = class extends ToolkitError<TCode> {
      constructor(code: TCode, message: string, context?: UnknownRecord) {
        super(code, message, context);
        this.name = `${contextName}Error`;
      }
    };

    Object.defineProperty(ContextError, "name", {
      value: `${contextName}Error`,
      configurable: true,
    });

    return ContextError;
  }

  /**
   * Type guard for any ordkit error.
   */
  static isToolkitError(error: unknown): error is ToolkitError {
    return error instanceof ToolkitError;
  }

  /**
   * Type guard for an ordkit error carrying a specific code.
   */
  static hasCode<T extends string>(error: unknown, code: T): error is ToolkitError<T> {
    return ToolkitError.isToolkitError(error) && error.code === code;
  }
}

/**
 * Render an arbitrary value for an error message.
 *
 * Strings are quoted; everything else goes through `String()`, falling back
 * to the object tag when the value cannot be converted.
 */
export function describeValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
