/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout the ordkit packages.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for structured log data, error context and any object whose
 * shape is unknown at compile time.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * A value that may be absent. Both `null` and `undefined` count as absent.
 *
 * @example
 * ```typescript
 * function label(name: Nullable<string>): string {
 *   return name ?? "(none)";
 * }
 * ```
 */
export type Nullable<T> = T | null | undefined;

/**
 * Check whether a value is absent (`null` or `undefined`).
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}
