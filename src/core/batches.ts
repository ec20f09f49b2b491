import type { Batch } from "./model.js";

// =============================================================================
// BATCH ITERATOR
// =============================================================================

/**
 * Lazily splits `items` into contiguous windows of `size`.
 * The returned iterable can be walked any number of times and yields the same batches.
 */
export function iterateBatches<T>(items: readonly T[], size: number): Iterable<Batch<T>> {
  assertBatchSize(size);

  return {
    *[Symbol.iterator]() {
      let index = 1;
      for (let start = 0; start < items.length; start += size) {
        yield { index, items: items.slice(start, start + size) };
        index += 1;
      }
    },
  };
}

export function countBatches(total: number, size: number): number {
  assertBatchSize(size);
  return Math.ceil(total / size);
}

function assertBatchSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`batch size must be a positive integer (received ${size})`);
  }
}
