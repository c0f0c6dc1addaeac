/**
 * ## Null-Safe and Fallback Comparison
 *
 * `compare` is the typed entry point: its `Orderable` bound is checked at
 * compile time, and absent values are ranked by an explicit flag.
 *
 * `compareAny` is the separate fallback path for heterogeneous collections
 * whose element types are not known statically. It never throws, and works
 * through a fixed chain:
 *
 * 1. Identical values (`Object.is`) compare as 0
 * 2. Absent values are ranked by `isNullGreater`
 * 3. Mutually orderable values use their natural order
 * 4. Values equal by either side's `equals()` method compare as 0
 * 5. 32-bit hash codes are compared
 * 6. String representations break remaining ties
 *
 * Objects without a `hashCode()` method get an identity hash assigned in
 * first-seen order. That order is stable for the life of the process but
 * NOT across restarts, so `compareAny` results must not be persisted or
 * relied on for reproducible sorting of such objects.
 */

import { isAbsent, type Nullable } from "@ordkit/core";
import { areMutuallyOrderable, naturalCompare } from "./natural.js";
import { compareNumbers, compareStrings } from "./primitives.js";
import type { Comparator, Equatable, Hashable, Orderable } from "./types.js";

/**
 * Compare two values that may be absent, using their natural order.
 *
 * @param isNullGreater - Rank absent values after present ones (default: before)
 * @throws CompareError NOT_COMPARABLE when present values have no shared natural order
 *
 * @example
 * ```typescript
 * compare(1, 2);          // -1
 * compare(null, 1);       // -1
 * compare(null, 1, true); // 1
 * ```
 */
export function compare<T extends Orderable>(
  c1: Nullable<T>,
  c2: Nullable<T>,
  isNullGreater?: boolean
): number;
/**
 * Compare with a comparator; without one, fall back to the null-safe
 * natural order.
 *
 * @throws CompareError NOT_COMPARABLE when no comparator is given and the
 *   values have no shared natural order
 */
export function compare<T>(c1: T, c2: T, comparator: Nullable<Comparator<T>>): number;
export function compare(
  c1: unknown,
  c2: unknown,
  option?: boolean | Nullable<Comparator<unknown>>
): number {
  if (typeof option === "function") {
    return option(c1, c2);
  }
  return nullSafeCompare(c1, c2, option === true);
}

/**
 * Untyped null-safe natural comparison shared by `compare` and the derived
 * predicates.
 */
export function nullSafeCompare(c1: unknown, c2: unknown, isNullGreater: boolean): number {
  if (Object.is(c1, c2)) return 0;

  const absent = compareAbsent(c1, c2, isNullGreater);
  if (absent !== undefined) return absent;

  return naturalCompare(c1, c2);
}

function compareAbsent(c1: unknown, c2: unknown, isNullGreater: boolean): number | undefined {
  if (isAbsent(c1)) {
    if (isAbsent(c2)) return 0;
    return isNullGreater ? 1 : -1;
  }
  if (isAbsent(c2)) {
    return isNullGreater ? -1 : 1;
  }
  return undefined;
}

/**
 * Compare arbitrary values through the fallback chain described above.
 *
 * @param isNullGreater - Rank absent values after present ones (default: before)
 */
export function compareAny(o1: unknown, o2: unknown, isNullGreater = false): number {
  if (Object.is(o1, o2)) return 0;

  const absent = compareAbsent(o1, o2, isNullGreater);
  if (absent !== undefined) return absent;

  if (areMutuallyOrderable(o1, o2)) {
    return naturalCompare(o1, o2);
  }

  if ((isEquatable(o1) && o1.equals(o2)) || (isEquatable(o2) && o2.equals(o1))) {
    return 0;
  }

  const result = compareNumbers(hashCodeOf(o1), hashCodeOf(o2));
  if (result !== 0) return result;

  return compareStrings(stringOf(o1), stringOf(o2));
}

/**
 * Check whether a value defines `equals()`.
 */
export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

/**
 * Check whether a value defines `hashCode()`.
 */
export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "hashCode" in value &&
    typeof value.hashCode === "function"
  );
}

const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

function identityHashOf(value: object): number {
  let hash = identityHashes.get(value);
  if (hash === undefined) {
    hash = nextIdentityHash++;
    identityHashes.set(value, hash);
  }
  return hash;
}

/**
 * 31-based polynomial hash over UTF-16 code units, truncated to 32 bits.
 */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

/**
 * 32-bit hash code of any value.
 *
 * - `hashCode()` when the value defines one
 * - a string hash of `typeof` and text for primitives
 * - an identity hash for other objects and functions (per process)
 */
export function hashCodeOf(value: unknown): number {
  if (isHashable(value)) {
    return value.hashCode() | 0;
  }
  if ((typeof value === "object" && value !== null) || typeof value === "function") {
    return identityHashOf(value);
  }
  return hashString(`${typeof value}:${String(value)}`);
}

function stringOf(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}
