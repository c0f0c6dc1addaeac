/**
 * ## Comparator Types - Ordering Capabilities
 *
 * Comparators are plain functions `(a, b) => number`: negative when `a`
 * sorts first, zero when equivalent, positive when `b` sorts first. Any
 * routine that takes a two-argument ordering function accepts them,
 * including `Array.prototype.sort`.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `Comparator<T>` | Ordering function |
 * | `Comparable<T>` | Object with an intrinsic order (`compareTo`) |
 * | `Orderable` | Every value kind with a natural order |
 * | `Equatable<T>` / `Hashable` | Capabilities consulted by `compareAny` |
 * | `CompareError` | Thrown for non-comparable values or missing extractors |
 *
 * ### Natural Order by Kind
 *
 * | Kind | Order |
 * |------|-------|
 * | `number` | numeric; `-0 < 0`; `NaN` greatest |
 * | `bigint` | numeric |
 * | `string` | UTF-16 code units |
 * | `boolean` | `false < true` |
 * | `Date` | epoch milliseconds |
 * | `Comparable` | `a.compareTo(b)` |
 *
 * @example
 * ```typescript
 * import type { Comparable } from "@ordkit/compare";
 *
 * class Version implements Comparable<Version> {
 *   constructor(readonly major: number, readonly minor: number) {}
 *
 *   compareTo(other: Version): number {
 *     return this.major - other.major || this.minor - other.minor;
 *   }
 * }
 * ```
 */

import { ToolkitError } from "@ordkit/core";

/**
 * Two-argument ordering function.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Derives the value that takes part in a comparison.
 */
export type KeyExtractor<T, K> = (value: T) => K;

/**
 * An object carrying its own total order.
 *
 * `compareTo` must be antisymmetric and transitive, and return 0 when an
 * instance is compared with itself.
 */
export interface Comparable<T> {
  compareTo(other: T): number;
}

/**
 * Value kinds with a natural order.
 */
export type Orderable = number | bigint | string | boolean | Date | Comparable<unknown>;

/**
 * An object defining value equality.
 */
export interface Equatable<T = unknown> {
  equals(other: T): boolean;
}

/**
 * An object supplying its own 32-bit hash code.
 */
export interface Hashable {
  hashCode(): number;
}

export const CompareErrorCodes = {
  /** Values have no natural order, or natural orders of different kinds */
  NOT_COMPARABLE: "NOT_COMPARABLE",
  /** A comparator factory was called without a key extractor */
  MISSING_KEY_EXTRACTOR: "MISSING_KEY_EXTRACTOR",
} as const;

export type CompareErrorCode = (typeof CompareErrorCodes)[keyof typeof CompareErrorCodes];

/**
 * Error thrown by comparator factories and natural-order comparisons.
 */
export const CompareError = ToolkitError.forContext<CompareErrorCode>("Compare");
