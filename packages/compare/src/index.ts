/**
 * Null-safe, composable comparators.
 *
 * @example
 * ```typescript
 * import { compare, comparingIndexed, isIn, natural, reverse } from "@ordkit/compare";
 *
 * compare(null, 1);            // -1: absent values sort first
 * compare(null, 1, true);      // 1: or last
 *
 * [3, 1, 2].sort(reverse(natural<number>())); // [3, 2, 1]
 *
 * const bySeverity = comparingIndexed((e: Issue) => e.severity, ["critical", "major", "minor"]);
 * issues.sort(bySeverity);
 *
 * isIn(5, 10, 1); // true
 * ```
 *
 * @module @ordkit/compare
 */

// Types
export type {
  Comparator,
  KeyExtractor,
  Comparable,
  Orderable,
  Equatable,
  Hashable,
  CompareErrorCode,
} from "./types.js";
export { CompareError, CompareErrorCodes } from "./types.js";

// Primitive comparisons
export {
  compareNumbers,
  compareBigInts,
  compareStrings,
  compareBooleans,
  compareDates,
} from "./primitives.js";

// Natural order and composition
export {
  isComparable,
  isOrderable,
  areMutuallyOrderable,
  naturalCompare,
  natural,
  naturalReverse,
  reverse,
  nullsFirst,
  nullsLast,
  comparing,
  thenComparing,
} from "./natural.js";

// Null-safe and fallback comparison
export {
  compare,
  nullSafeCompare,
  compareAny,
  isEquatable,
  isHashable,
  hashString,
  hashCodeOf,
} from "./compare.js";

// Key-based comparators
export { IndexedComparator, comparingIndexed } from "./indexed.js";
export { PinyinComparator, PINYIN_LOCALE, comparingPinyin } from "./pinyin.js";

// Derived comparisons
export { min, max, equals, gt, ge, lt, le, isIn, isInExclusive } from "./operations.js";
