/**
 * Unit tests for PartitionIterator.
 */
import { describe, it, expect, vi } from "vitest";
import { createMockLogger, ToolkitError } from "@ordkit/core";
import { CollectionError, PartitionIterator, partition } from "../../src/index.js";

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i + 1);
}

function* naturals(pulled: { count: number }): Generator<number> {
  for (let n = 1; ; n++) {
    pulled.count++;
    yield n;
  }
}

describe("PartitionIterator", () => {
  describe("construction", () => {
    it.each([0, -1, 2.5, Number.NaN, Number.POSITIVE_INFINITY])(
      "should reject partition size %s",
      (size) => {
        expect(() => new PartitionIterator([1, 2, 3], size)).toThrow(CollectionError);
      }
    );

    it("should report the offending size", () => {
      try {
        partition([1], 0);
        expect.fail("expected construction to throw");
      } catch (error) {
        expect(ToolkitError.hasCode(error, "INVALID_PARTITION_SIZE")).toBe(true);
        expect(error).toBeInstanceOf(CollectionError);
        expect(error).toHaveProperty("message", "Partition size must be an integer >= 1, got 0");
        expect(error).toHaveProperty("context", { size: 0 });
      }
    });

    it("should not pull from the source", () => {
      const pulled = { count: 0 };
      partition(naturals(pulled), 4);

      expect(pulled.count).toBe(0);
    });
  });

  describe("partitioning", () => {
    it("should split 14 elements at size 3 into 3, 3, 3, 3, 2", () => {
      const sizes = Array.from(partition(range(14), 3), (chunk) => chunk.length);

      expect(sizes).toEqual([3, 3, 3, 3, 2]);
    });

    it("should yield nothing for an empty source", () => {
      expect(Array.from(partition([], 3))).toEqual([]);
    });

    it("should yield a single partition when size exceeds the source", () => {
      expect(Array.from(partition(["a", "b"], 10))).toEqual([["a", "b"]]);
    });

    it("should yield single-element partitions at size 1", () => {
      expect(Array.from(partition("abc", 1))).toEqual([["a"], ["b"], ["c"]]);
    });

    it("should preserve order and partition count for every length and size", () => {
      for (let length = 0; length <= 20; length++) {
        for (let size = 1; size <= 6; size++) {
          const source = range(length);
          const chunks = Array.from(partition(source, size));

          expect(chunks).toHaveLength(Math.ceil(length / size));
          expect(chunks.flat()).toEqual(source);
          chunks.slice(0, -1).forEach((chunk) => expect(chunk).toHaveLength(size));
        }
      }
    });

    it("should return fresh arrays for each partition", () => {
      const iterator = partition([1, 2, 3, 4], 2);
      const first = iterator.nextPartition();
      first.push(99);

      expect(iterator.nextPartition()).toEqual([3, 4]);
    });

    it("should accept a bare iterator", () => {
      let n = 0;
      const counter: Iterator<number> = {
        next: () => (n < 5 ? { done: false, value: n++ } : { done: true, value: undefined }),
      };

      expect(Array.from(partition(counter, 2))).toEqual([[0, 1], [2, 3], [4]]);
    });
  });

  describe("hasNext", () => {
    it("should look ahead by at most one element", () => {
      const pulled = { count: 0 };
      const iterator = partition(naturals(pulled), 3);

      expect(iterator.nextPartition()).toEqual([1, 2, 3]);
      expect(pulled.count).toBe(3);

      expect(iterator.hasNext()).toBe(true);
      expect(iterator.hasNext()).toBe(true);
      expect(pulled.count).toBe(4);

      expect(iterator.nextPartition()).toEqual([4, 5, 6]);
      expect(pulled.count).toBe(6);
    });

    it("should stay false once the source is exhausted", () => {
      const iterator = partition([1], 2);
      iterator.next();

      expect(iterator.hasNext()).toBe(false);
      expect(iterator.hasNext()).toBe(false);
      expect(iterator.next()).toEqual({ done: true, value: undefined });
    });
  });

  describe("nextPartition", () => {
    it("should throw NO_SUCH_ELEMENT after the last partition", () => {
      const iterator = partition([1, 2, 3], 2);
      iterator.nextPartition();
      iterator.nextPartition();

      expect(() => iterator.nextPartition()).toThrow("No partitions remain");
      expect(() => iterator.nextPartition()).toThrow(CollectionError);
    });
  });

  describe("return", () => {
    it("should close the source and end iteration", () => {
      let closed = false;
      function* source(): Generator<number> {
        try {
          yield* [1, 2, 3, 4, 5];
        } finally {
          closed = true;
        }
      }

      const iterator = partition(source(), 2);
      expect(iterator.nextPartition()).toEqual([1, 2]);

      expect(iterator.return()).toEqual({ done: true, value: undefined });
      expect(closed).toBe(true);
      expect(iterator.hasNext()).toBe(false);
    });

    it("should run when a for...of loop breaks early", () => {
      let closed = false;
      const pulled = { count: 0 };
      function* source(): Generator<number> {
        try {
          yield* naturals(pulled);
        } finally {
          closed = true;
        }
      }

      const seen: number[][] = [];
      for (const chunk of partition(source(), 2)) {
        seen.push(chunk);
        if (seen.length === 2) {
          break;
        }
      }

      expect(seen).toEqual([
        [1, 2],
        [3, 4],
      ]);
      expect(closed).toBe(true);
    });
  });

  describe("logging", () => {
    it("should log each partition and exhaustion at DEBUG", () => {
      const logger = createMockLogger();
      Array.from(partition(range(5), 2, { logger }));

      expect(logger.getCallsAtLevel("DEBUG").map((call) => [call.message, call.data])).toEqual([
        ["Partition emitted", { index: 0, size: 2 }],
        ["Partition emitted", { index: 1, size: 2 }],
        ["Partition emitted", { index: 2, size: 1 }],
        ["Source exhausted", { partitions: 3, elements: 5 }],
      ]);
    });

    it("should log exhaustion once", () => {
      const logger = createMockLogger();
      const iterator = partition([], 2, { logger });
      iterator.hasNext();
      iterator.hasNext();
      iterator.next();

      expect(logger.messagesAt("DEBUG")).toEqual(["Source exhausted"]);
    });

    it("should accept the runtime console as its logger", () => {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      try {
        Array.from(partition([1, 2, 3], 3, { logger: console }));

        expect(debug.mock.calls).toEqual([
          ["Partition emitted", { index: 0, size: 3 }],
          ["Source exhausted", { partitions: 1, elements: 3 }],
        ]);
      } finally {
        debug.mockRestore();
      }
    });

    it("should log nothing above DEBUG", () => {
      const logger = createMockLogger();
      Array.from(partition(range(4), 2, { logger }));

      expect(logger.calls.every((call) => call.level === "DEBUG")).toBe(true);
    });
  });
});
