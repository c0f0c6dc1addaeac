/**
 * ## Natural Order and Comparator Composition
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `natural()` | `Comparator<T>` | Intrinsic order of `Orderable` values |
 * | `naturalReverse()` | `Comparator<T>` | Inverse of `natural()` |
 * | `reverse(cmp?)` | `Comparator<T>` | `cmp` inverted, or `naturalReverse()` |
 * | `nullsFirst(cmp)` / `nullsLast(cmp)` | `Comparator<Nullable<T>>` | Absent-value policy |
 * | `comparing(key, cmp?)` | `Comparator<T>` | Order by an extracted key |
 * | `thenComparing(first, ...rest)` | `Comparator<T>` | First non-zero result wins |
 *
 * `natural()` does not accept absent values; wrap it in `nullsFirst` or
 * `nullsLast`, or use the null-safe `compare`.
 *
 * @example
 * ```typescript
 * import { comparing, natural, nullsLast, thenComparing } from "@ordkit/compare";
 *
 * people.sort(
 *   thenComparing(
 *     comparing((p: Person) => p.lastName),
 *     comparing((p: Person) => p.age, nullsLast(natural<number>()))
 *   )
 * );
 * ```
 */

import { describeValue, isAbsent, type Nullable } from "@ordkit/core";
import { compareBigInts, compareBooleans, compareDates, compareNumbers, compareStrings } from "./primitives.js";
import { CompareError } from "./types.js";
import type { Comparable, Comparator, KeyExtractor, Orderable } from "./types.js";

/**
 * Check whether a value implements `Comparable`.
 */
export function isComparable(value: unknown): value is Comparable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "compareTo" in value &&
    typeof value.compareTo === "function"
  );
}

/**
 * Check whether a value has a natural order.
 */
export function isOrderable(value: unknown): value is Orderable {
  switch (typeof value) {
    case "number":
    case "bigint":
    case "string":
    case "boolean":
      return true;
    default:
      return value instanceof Date || isComparable(value);
  }
}

/**
 * Check whether two values can be ordered against each other: the same
 * primitive kind, two dates, or two `Comparable` objects.
 */
export function areMutuallyOrderable(a: unknown, b: unknown): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date;
  }
  if (isComparable(a) || isComparable(b)) {
    return isComparable(a) && isComparable(b);
  }
  return typeof a === typeof b && isOrderable(a);
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (value instanceof Date) return "Date";
  if (typeof value === "object") return value.constructor?.name ?? "Object";
  return typeof value;
}

/**
 * Compare two non-absent values by their natural order.
 *
 * @throws CompareError NOT_COMPARABLE unless both values are of the same
 *   primitive kind, both dates, or both `Comparable`
 */
export function naturalCompare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return compareNumbers(a, b);
  if (typeof a === "string" && typeof b === "string") return compareStrings(a, b);
  if (typeof a === "bigint" && typeof b === "bigint") return compareBigInts(a, b);
  if (typeof a === "boolean" && typeof b === "boolean") return compareBooleans(a, b);
  if (a instanceof Date && b instanceof Date) return compareDates(a, b);
  if (isComparable(a) && isComparable(b)) return a.compareTo(b);

  throw new CompareError(
    "NOT_COMPARABLE",
    `Cannot compare ${describeValue(a)} with ${describeValue(b)}: no shared natural order`,
    { left: kindOf(a), right: kindOf(b) }
  );
}

const naturalOrder: Comparator<unknown> = naturalCompare;
const reverseNaturalOrder: Comparator<unknown> = (a, b) => naturalCompare(b, a);

/**
 * Comparator for the natural order of `Orderable` values.
 */
export function natural<T extends Orderable>(): Comparator<T> {
  return naturalOrder;
}

/**
 * Comparator for the inverse of the natural order.
 */
export function naturalReverse<T extends Orderable>(): Comparator<T> {
  return reverseNaturalOrder;
}

/**
 * Invert a comparator. Without one, returns `naturalReverse()`.
 */
export function reverse<T>(comparator: Comparator<T>): Comparator<T>;
export function reverse<T extends Orderable>(comparator?: Nullable<Comparator<T>>): Comparator<T>;
export function reverse<T>(comparator?: Nullable<Comparator<T>>): Comparator<T> {
  if (isAbsent(comparator)) {
    return reverseNaturalOrder;
  }
  const forward = comparator;
  return (a, b) => forward(b, a);
}

/**
 * Wrap a comparator so absent values sort before everything else.
 */
export function nullsFirst<T>(comparator: Comparator<T>): Comparator<Nullable<T>> {
  return withAbsentPolicy(comparator, false);
}

/**
 * Wrap a comparator so absent values sort after everything else.
 */
export function nullsLast<T>(comparator: Comparator<T>): Comparator<Nullable<T>> {
  return withAbsentPolicy(comparator, true);
}

function withAbsentPolicy<T>(
  comparator: Comparator<T>,
  isNullGreater: boolean
): Comparator<Nullable<T>> {
  return (a, b) => {
    if (isAbsent(a)) {
      if (isAbsent(b)) return 0;
      return isNullGreater ? 1 : -1;
    }
    if (isAbsent(b)) {
      return isNullGreater ? -1 : 1;
    }
    return comparator(a, b);
  };
}

/**
 * Order values by a key.
 *
 * @param keyExtractor - Derives the key to compare
 * @param comparator - Orders keys (default: natural order)
 */
export function comparing<T, K extends Orderable>(keyExtractor: KeyExtractor<T, K>): Comparator<T>;
export function comparing<T, K>(
  keyExtractor: KeyExtractor<T, K>,
  comparator: Comparator<K>
): Comparator<T>;
export function comparing<T, K>(
  keyExtractor: KeyExtractor<T, K>,
  comparator: Comparator<K> = naturalOrder
): Comparator<T> {
  return (a, b) => comparator(keyExtractor(a), keyExtractor(b));
}

/**
 * Combine comparators: later ones only break ties left by earlier ones.
 */
export function thenComparing<T>(
  first: Comparator<T>,
  ...rest: ReadonlyArray<Comparator<T>>
): Comparator<T> {
  return (a, b) => {
    let result = first(a, b);
    for (const next of rest) {
      if (result !== 0) break;
      result = next(a, b);
    }
    return result;
  };
}
