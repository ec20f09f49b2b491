import { describe, expect, it } from "vitest";

import { countBatches, iterateBatches } from "./batches.js";

describe("iterateBatches", () => {
  it("yields contiguous 1-based batches with a short final window", () => {
    const batches = [...iterateBatches([1, 2, 3, 4, 5], 2)];

    expect(batches).toEqual([
      { index: 1, items: [1, 2] },
      { index: 2, items: [3, 4] },
      { index: 3, items: [5] },
    ]);
  });

  it("yields full windows when the size divides the collection", () => {
    expect([...iterateBatches([1, 2, 3, 4, 5, 6], 3)]).toEqual([
      { index: 1, items: [1, 2, 3] },
      { index: 2, items: [4, 5, 6] },
    ]);
  });

  it("covers every collection length and size with ceil(N/B) ordered windows", () => {
    for (let total = 0; total < 60; total += 1) {
      const items = Array.from({ length: total }, (_, i) => i);

      for (let size = 1; size < 15; size += 1) {
        const batches = [...iterateBatches(items, size)];
        const expectedCount = Math.ceil(total / size);

        expect(batches).toHaveLength(expectedCount);
        expect(countBatches(total, size)).toBe(expectedCount);
        batches.forEach((batch, position) => {
          expect(batch.index).toBe(position + 1);
          const expectedLength =
            position === expectedCount - 1 ? total - size * (expectedCount - 1) : size;
          expect(batch.items).toHaveLength(expectedLength);
        });
        expect(batches.flatMap((batch) => batch.items)).toEqual(items);
      }
    }
  });

  it("yields nothing for an empty collection", () => {
    expect([...iterateBatches([], 10)]).toEqual([]);
  });

  it("yields the same batches on every iteration", () => {
    const batches = iterateBatches(["a", "b", "c"], 2);

    expect([...batches]).toEqual([...batches]);
  });

  it("rejects non-positive sizes", () => {
    expect(() => iterateBatches([1], 0)).toThrow(/positive integer/);
    expect(() => countBatches(10, 1.5)).toThrow(/positive integer/);
  });
});

describe("countBatches", () => {
  it("rounds up", () => {
    expect(countBatches(0, 100)).toBe(0);
    expect(countBatches(100, 100)).toBe(1);
    expect(countBatches(101, 100)).toBe(2);
  });
});
