/**
 * ## Index-Based Ordering
 *
 * Orders values by the position of their key in a reference sequence, for
 * orders that exist only as a list ("high, medium, low", a priority table).
 *
 * Positions are computed once at construction; the first occurrence of a
 * duplicated key wins. Lookup uses `Map` key equality (SameValueZero);
 * keys defining `equals()` are matched by a scan with `equals()` instead, so
 * the first equal reference entry wins there too.
 *
 * Keys missing from the reference all sort before present keys, or all
 * after with `atEndIfMiss`. Two missing keys compare as 0, so their relative
 * order is whatever the (stable) sort keeps.
 *
 * @example
 * ```typescript
 * const byPriority = comparingIndexed((t: Task) => t.priority, ["high", "medium", "low"]);
 * tasks.sort(byPriority);
 * ```
 */

import { isAbsent, type Nullable } from "@ordkit/core";
import { isEquatable } from "./compare.js";
import { CompareError } from "./types.js";
import type { Comparator, KeyExtractor } from "./types.js";

/**
 * Comparator over keys, ordered by their position in a reference sequence.
 */
export class IndexedComparator<U> {
  private readonly keys: readonly U[];
  private readonly positions = new Map<U, number>();

  constructor(
    readonly atEndIfMiss: boolean,
    reference: Iterable<U>
  ) {
    this.keys = Array.from(reference);
    this.keys.forEach((key, index) => {
      if (!this.positions.has(key)) {
        this.positions.set(key, index);
      }
    });
  }

  /**
   * Position of `key` in the reference sequence, or -1 when absent.
   */
  indexOf(key: U): number {
    if (isEquatable(key)) {
      return this.keys.findIndex((candidate) => key.equals(candidate));
    }
    return this.positions.get(key) ?? -1;
  }

  /**
   * Sort rank of `key`: its position, or the miss rank before (-1) or after
   * (reference length) every present key.
   */
  rankOf(key: U): number {
    const index = this.indexOf(key);
    if (index >= 0) {
      return index;
    }
    return this.atEndIfMiss ? this.keys.length : -1;
  }

  readonly compare: Comparator<U> = (a, b) => {
    const rankA = this.rankOf(a);
    const rankB = this.rankOf(b);
    return rankA < rankB ? -1 : rankA > rankB ? 1 : 0;
  };
}

/**
 * Order values by the position of an extracted key in `reference`. Missing
 * keys sort first.
 *
 * @throws CompareError MISSING_KEY_EXTRACTOR when `keyExtractor` is absent
 */
export function comparingIndexed<T, U>(
  keyExtractor: Nullable<KeyExtractor<T, U>>,
  reference: Iterable<U>
): Comparator<T>;
/**
 * Order values by the position of an extracted key in `reference`.
 *
 * @param atEndIfMiss - Sort missing keys after present ones instead of before
 * @throws CompareError MISSING_KEY_EXTRACTOR when `keyExtractor` is absent
 */
export function comparingIndexed<T, U>(
  keyExtractor: Nullable<KeyExtractor<T, U>>,
  atEndIfMiss: boolean,
  reference: Iterable<U>
): Comparator<T>;
export function comparingIndexed<T, U>(
  keyExtractor: Nullable<KeyExtractor<T, U>>,
  atEndOrReference: boolean | Iterable<U>,
  reference?: Iterable<U>
): Comparator<T> {
  const extract = requireKeyExtractor(keyExtractor, "comparingIndexed");
  const indexed =
    typeof atEndOrReference === "boolean"
      ? new IndexedComparator<U>(atEndOrReference, reference ?? [])
      : new IndexedComparator<U>(false, atEndOrReference);

  return (a, b) => indexed.compare(extract(a), extract(b));
}

/**
 * Return the key extractor, or throw when a factory received none.
 */
export function requireKeyExtractor<T, K>(
  keyExtractor: Nullable<KeyExtractor<T, K>>,
  factory: string
): KeyExtractor<T, K> {
  if (isAbsent(keyExtractor)) {
    throw new CompareError("MISSING_KEY_EXTRACTOR", `${factory} requires a key extractor`, {
      factory,
    });
  }
  return keyExtractor;
}
