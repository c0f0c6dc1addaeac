/**
 * Sample value types exercising each comparison capability.
 */
import type { Comparable, Equatable, Hashable } from "../../src/index.js";

/** Comparable by major, then minor. */
export class Version implements Comparable<Version> {
  constructor(
    readonly major: number,
    readonly minor: number
  ) {}

  compareTo(other: Version): number {
    return this.major - other.major || this.minor - other.minor;
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }
}

/** Equal by coordinates, no natural order. */
export class Point implements Equatable {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Point && other.x === this.x && other.y === this.y;
  }
}

/** Fixed hash code and string form. */
export class Tagged implements Hashable {
  constructor(
    readonly hash: number,
    readonly label: string
  ) {}

  hashCode(): number {
    return this.hash;
  }

  toString(): string {
    return this.label;
  }
}

/** Key type matched by value through equals(). */
export class Code implements Equatable {
  constructor(readonly value: string) {}

  equals(other: unknown): boolean {
    return other instanceof Code && other.value === this.value;
  }
}
