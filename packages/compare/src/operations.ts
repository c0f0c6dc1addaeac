/**
 * ## Derived Comparisons
 *
 * Predicates and selectors built on the null-safe natural comparison, where
 * absent values are the smallest.
 *
 * | Function | Returns | Definition |
 * |----------|---------|------------|
 * | `min(a, b)` | `T` | `compare(a, b) <= 0 ? a : b` |
 * | `max(a, b)` | `T` | `compare(a, b) >= 0 ? a : b` |
 * | `equals(a, b)` | `boolean` | `compare(a, b) == 0` |
 * | `gt` / `ge` / `lt` / `le` | `boolean` | `compare(a, b)` against 0 |
 * | `isIn(v, a, b)` | `boolean` | `min(a, b) <= v <= max(a, b)` |
 * | `isInExclusive(v, a, b)` | `boolean` | `min(a, b) < v < max(a, b)` |
 *
 * Ties in `min` and `max` return the first argument. The range checks
 * normalize their bounds, so argument order never matters.
 *
 * @example
 * ```typescript
 * isIn(5, 10, 1);          // true
 * isInExclusive(10, 1, 10); // false
 * max(null, 3);            // 3
 * ```
 */

import type { Nullable } from "@ordkit/core";
import { nullSafeCompare } from "./compare.js";
import type { Orderable } from "./types.js";

/**
 * Smaller of two values; the first when they are equal.
 */
export function min<T extends Nullable<Orderable>>(t1: T, t2: T): T {
  return nullSafeCompare(t1, t2, false) <= 0 ? t1 : t2;
}

/**
 * Larger of two values; the first when they are equal.
 */
export function max<T extends Nullable<Orderable>>(t1: T, t2: T): T {
  return nullSafeCompare(t1, t2, false) >= 0 ? t1 : t2;
}

/**
 * Whether `c1` and `c2` compare as equal.
 */
export function equals<T extends Orderable>(c1: Nullable<T>, c2: Nullable<T>): boolean {
  return nullSafeCompare(c1, c2, false) === 0;
}

/** Whether `c1 > c2`. */
export function gt<T extends Orderable>(c1: Nullable<T>, c2: Nullable<T>): boolean {
  return nullSafeCompare(c1, c2, false) > 0;
}

/** Whether `c1 >= c2`. */
export function ge<T extends Orderable>(c1: Nullable<T>, c2: Nullable<T>): boolean {
  return nullSafeCompare(c1, c2, false) >= 0;
}

/** Whether `c1 < c2`. */
export function lt<T extends Orderable>(c1: Nullable<T>, c2: Nullable<T>): boolean {
  return nullSafeCompare(c1, c2, false) < 0;
}

/** Whether `c1 <= c2`. */
export function le<T extends Orderable>(c1: Nullable<T>, c2: Nullable<T>): boolean {
  return nullSafeCompare(c1, c2, false) <= 0;
}

/**
 * Whether `value` lies between `c1` and `c2`, bounds included.
 */
export function isIn<T extends Orderable>(
  value: Nullable<T>,
  c1: Nullable<T>,
  c2: Nullable<T>
): boolean {
  return ge(value, min(c1, c2)) && le(value, max(c1, c2));
}

/**
 * Whether `value` lies strictly between `c1` and `c2`.
 */
export function isInExclusive<T extends Orderable>(
  value: Nullable<T>,
  c1: Nullable<T>,
  c2: Nullable<T>
): boolean {
  return gt(value, min(c1, c2)) && lt(value, max(c1, c2));
}
