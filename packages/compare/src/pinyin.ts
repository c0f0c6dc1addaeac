/**
 * ## Pinyin Ordering
 *
 * Orders Chinese text by its Hanyu Pinyin romanization, using the ICU
 * collation bundled with the runtime (`Intl.Collator` with the `pinyin`
 * collation type). No transliteration tables ship with this package.
 */

import { isAbsent, type Nullable } from "@ordkit/core";
import { requireKeyExtractor } from "./indexed.js";
import type { Comparator, KeyExtractor } from "./types.js";

/**
 * Locale tag selecting Chinese pinyin collation.
 */
export const PINYIN_LOCALE = "zh-u-co-pinyin";

/**
 * Pinyin comparator over strings. Absent strings sort first.
 */
export class PinyinComparator {
  private readonly collator = new Intl.Collator(PINYIN_LOCALE);

  readonly compare: Comparator<Nullable<string>> = (a, b) => {
    if (isAbsent(a)) {
      return isAbsent(b) ? 0 : -1;
    }
    if (isAbsent(b)) {
      return 1;
    }
    return Math.sign(this.collator.compare(a, b));
  };
}

/**
 * Order values by the pinyin collation of an extracted string.
 *
 * @param keyExtractor - Derives the text to compare
 * @param reverse - Invert the order
 * @throws CompareError MISSING_KEY_EXTRACTOR when `keyExtractor` is absent
 *
 * @example
 * ```typescript
 * const byName = comparingPinyin((c: Contact) => c.name);
 * contacts.sort(byName); // 李四, 王五, 张三
 * ```
 */
export function comparingPinyin<T>(
  keyExtractor: Nullable<KeyExtractor<T, Nullable<string>>>,
  reverse = false
): Comparator<T> {
  const extract = requireKeyExtractor(keyExtractor, "comparingPinyin");
  const pinyin = new PinyinComparator();

  if (reverse) {
    return (a, b) => pinyin.compare(extract(b), extract(a));
  }
  return (a, b) => pinyin.compare(extract(a), extract(b));
}
