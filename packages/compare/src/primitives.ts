/**
 * Comparisons of primitive values, each a total order returning -1, 0 or 1.
 */

/**
 * Compare two numbers.
 *
 * Unlike `a - b`, this is a total order: `-0` sorts before `0`, and `NaN`
 * sorts after every other number and equals itself.
 */
export function compareNumbers(x: number, y: number): number {
  if (x < y) return -1;
  if (x > y) return 1;

  const xNaN = Number.isNaN(x);
  const yNaN = Number.isNaN(y);
  if (xNaN || yNaN) {
    if (xNaN && yNaN) return 0;
    return xNaN ? 1 : -1;
  }

  if (x === 0) {
    const xNegative = Object.is(x, -0);
    const yNegative = Object.is(y, -0);
    if (xNegative !== yNegative) return xNegative ? -1 : 1;
  }
  return 0;
}

export function compareBigInts(x: bigint, y: bigint): number {
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Compare strings by UTF-16 code units (no locale rules).
 */
export function compareStrings(x: string, y: string): number {
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * `false` sorts before `true`.
 */
export function compareBooleans(x: boolean, y: boolean): number {
  return x === y ? 0 : x ? 1 : -1;
}

/**
 * Compare dates by epoch milliseconds. Invalid dates sort last.
 */
export function compareDates(x: Date, y: Date): number {
  return compareNumbers(x.getTime(), y.getTime());
}
