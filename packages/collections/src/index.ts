/**
 * Lazy partitioning and comparator-driven collection helpers.
 *
 * @example
 * ```typescript
 * import { partition, maxOf } from "@ordkit/collections";
 *
 * for (const batch of partition(rows, 500)) {
 *   insertMany(batch);
 * }
 *
 * maxOf([3, 9, 4]); // 9
 * ```
 *
 * @module @ordkit/collections
 */

// Types
export type {
  CollectionErrorCode,
  PartitionOptions,
  PartitionSource,
} from "./types.js";
export { CollectionError, CollectionErrorCodes, PartitionSizeSchema } from "./types.js";

// Partitioning
export { PartitionIterator, partition } from "./PartitionIterator.js";

// Selection
export { maxOf, minOf } from "./array.js";
