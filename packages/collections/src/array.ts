/**
 * ## Comparator-Driven Selection
 *
 * Single-pass maximum and minimum over any iterable. Absent values rank
 * lowest under the default natural order; pass a comparator for anything
 * without one.
 *
 * @example
 * ```typescript
 * maxOf([3, 9, 4]);                                    // 9
 * minOf(users, comparing((u: User) => u.joinedAt));   // earliest joiner
 * maxOf([]);                                           // undefined
 * ```
 */

import { nullSafeCompare, type Comparator, type Orderable } from "@ordkit/compare";
import type { Nullable } from "@ordkit/core";

function naturalNullsFirst(a: unknown, b: unknown): number {
  return nullSafeCompare(a, b, false);
}

/**
 * Keep the first element on ties: a later value replaces the current pick
 * only when `wins` accepts its comparison sign.
 */
function select<T>(
  values: Iterable<T>,
  comparator: Comparator<T>,
  wins: (sign: number) => boolean
): T | undefined {
  let best: { value: T } | undefined;
  for (const value of values) {
    if (best === undefined || wins(comparator(value, best.value))) {
      best = { value };
    }
  }
  return best?.value;
}

/**
 * Greatest element, or `undefined` when `values` is empty.
 */
export function maxOf<T extends Nullable<Orderable>>(values: Iterable<T>): T | undefined;
export function maxOf<T>(values: Iterable<T>, comparator: Comparator<T>): T | undefined;
export function maxOf<T>(values: Iterable<T>, comparator?: Comparator<T>): T | undefined {
  return select(values, comparator ?? naturalNullsFirst, (sign) => sign > 0);
}

/**
 * Least element, or `undefined` when `values` is empty.
 */
export function minOf<T extends Nullable<Orderable>>(values: Iterable<T>): T | undefined;
export function minOf<T>(values: Iterable<T>, comparator: Comparator<T>): T | undefined;
export function minOf<T>(values: Iterable<T>, comparator?: Comparator<T>): T | undefined {
  return select(values, comparator ?? naturalNullsFirst, (sign) => sign < 0);
}
