/**
 * ## Collection Types
 *
 * Error codes and option schemas shared by the collection helpers.
 */

import { z } from "zod";
import { ToolkitError, type Logger } from "@ordkit/core";

export const CollectionErrorCodes = {
  /** Partition size is not an integer >= 1 */
  INVALID_PARTITION_SIZE: "INVALID_PARTITION_SIZE",
  /** A partition was requested after the source ran out */
  NO_SUCH_ELEMENT: "NO_SUCH_ELEMENT",
} as const;

export type CollectionErrorCode = (typeof CollectionErrorCodes)[keyof typeof CollectionErrorCodes];

/**
 * Error thrown by the partitioning iterator.
 */
export const CollectionError = ToolkitError.forContext<CollectionErrorCode>("Collection");

/**
 * Maximum number of elements per partition.
 */
export const PartitionSizeSchema = z.number().int().min(1);

/**
 * Optional settings for a partitioning iterator.
 */
export interface PartitionOptions {
  /** Receives DEBUG events for emitted partitions (default: no-op; `console` works) */
  logger?: Logger;
}

/**
 * Anything a partitioning iterator can pull elements from.
 */
export type PartitionSource<T> = Iterable<T> | Iterator<T>;
