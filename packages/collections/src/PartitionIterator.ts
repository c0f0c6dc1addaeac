/**
 * ## PartitionIterator - Lazy Fixed-Size Chunking
 *
 * Adapts any iterable or iterator into a sequence of arrays holding at most
 * `size` consecutive elements. Elements are pulled on demand, so infinite
 * sources are fine as long as the consumer stops.
 *
 * ### Behavior
 *
 * | Source length | Size | Partitions |
 * |---------------|------|------------|
 * | 0 | any | none |
 * | 14 | 3 | 3, 3, 3, 3, 2 |
 * | 6 | 3 | 3, 3 |
 *
 * @example
 * ```typescript
 * for (const batch of partition(ids, 100)) {
 *   await fetchMany(batch);
 * }
 * ```
 */

import { createNoOpLogger, describeValue, type Logger } from "@ordkit/core";
import {
  CollectionError,
  PartitionSizeSchema,
  type PartitionOptions,
  type PartitionSource,
} from "./types.js";

function isIterable<T>(source: PartitionSource<T>): source is Iterable<T> {
  return typeof source === "string" || Symbol.iterator in source;
}

function toIterator<T>(source: PartitionSource<T>): Iterator<T> {
  if (isIterable(source)) {
    return source[Symbol.iterator]();
  }
  return source;
}

/**
 * Forward-only iterator over consecutive partitions of a source.
 *
 * Holds at most one element ahead of the consumer: `hasNext()` pulls a single
 * element to find out whether another partition exists, and that element
 * opens the next partition. Not safe to advance from more than one consumer.
 */
export class PartitionIterator<T> implements IterableIterator<T[]> {
  readonly size: number;

  private readonly source: Iterator<T>;
  private readonly logger: Logger;
  private lookahead: IteratorResult<T> | undefined;
  private exhausted = false;
  private partitions = 0;
  private elements = 0;

  constructor(source: PartitionSource<T>, size: number, options: PartitionOptions = {}) {
    const parsed = PartitionSizeSchema.safeParse(size);
    if (!parsed.success) {
      throw new CollectionError(
        "INVALID_PARTITION_SIZE",
        `Partition size must be an integer >= 1, got ${describeValue(size)}`,
        { size }
      );
    }
    this.size = parsed.data;
    this.source = toIterator(source);
    this.logger = options.logger ?? createNoOpLogger();
  }

  /**
   * Whether another partition is available. Repeated calls pull nothing more.
   */
  hasNext(): boolean {
    if (this.exhausted) {
      return false;
    }
    if (this.lookahead === undefined) {
      this.lookahead = this.source.next();
    }
    if (this.lookahead.done === true) {
      this.finish();
      return false;
    }
    return true;
  }

  next(): IteratorResult<T[]> {
    if (!this.hasNext()) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.take() };
  }

  /**
   * Pull the next partition, throwing once the source is exhausted.
   */
  nextPartition(): T[] {
    const result = this.next();
    if (result.done === true) {
      throw new CollectionError("NO_SUCH_ELEMENT", "No partitions remain", {
        partitions: this.partitions,
      });
    }
    return result.value;
  }

  /**
   * Stop early and close the underlying source.
   */
  return(): IteratorResult<T[]> {
    if (!this.exhausted) {
      this.exhausted = true;
      this.lookahead = undefined;
      this.source.return?.();
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private take(): T[] {
    const chunk: T[] = [];
    let current = this.lookahead;
    this.lookahead = undefined;

    while (current !== undefined && current.done !== true) {
      chunk.push(current.value);
      if (chunk.length === this.size) {
        break;
      }
      current = this.source.next();
      if (current.done === true) {
        this.lookahead = current;
      }
    }

    this.elements += chunk.length;
    this.logger.debug("Partition emitted", { index: this.partitions, size: chunk.length });
    this.partitions++;
    return chunk;
  }

  private finish(): void {
    this.exhausted = true;
    this.lookahead = undefined;
    this.logger.debug("Source exhausted", {
      partitions: this.partitions,
      elements: this.elements,
    });
  }
}

/**
 * Split a source into consecutive partitions of at most `size` elements.
 */
export function partition<T>(
  source: PartitionSource<T>,
  size: number,
  options?: PartitionOptions
): PartitionIterator<T> {
  return new PartitionIterator(source, size, options);
}
