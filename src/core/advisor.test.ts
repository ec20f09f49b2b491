import { describe, expect, it } from "vitest";

import {
  adviseConfiguration,
  LARGE_ENVIRONMENT_WARNING,
  resolveScaleTier,
} from "./advisor.js";

describe("adviseConfiguration", () => {
  it.each([
    [500, 100, 5, "any"],
    [5_000, 250, 8, "business-hours-ok"],
    [40_000, 500, 10, "business-hours-ok"],
    [90_000, 750, 15, "business-hours-ok"],
    [150_000, 1000, 20, "off-peak"],
  ] as const)(
    "recommends the scale-ladder values for %i subjects",
    (total, batchSize, concurrencyLimit, window) => {
      const advice = adviseConfiguration({ totalSubjects: total });

      expect(advice.batchSize).toBe(batchSize);
      expect(advice.concurrencyLimit).toBe(concurrencyLimit);
      expect(advice.recommendedWindow).toBe(window);
      expect(advice.throttleDelayMs).toBe(0);
    },
  );

  it("treats tier bounds as exclusive", () => {
    expect(resolveScaleTier(999).batchSize).toBe(100);
    expect(resolveScaleTier(1_000).batchSize).toBe(250);
    expect(resolveScaleTier(99_999).batchSize).toBe(750);
    expect(resolveScaleTier(100_000).batchSize).toBe(1000);
  });

  it("halves batch size and concurrency under low memory", () => {
    const advice = adviseConfiguration({ totalSubjects: 150_000, memoryMb: 1024 });

    expect(advice.batchSize).toBe(500);
    expect(advice.concurrencyLimit).toBe(10);
    expect(advice.warnings).toEqual([
      LARGE_ENVIRONMENT_WARNING,
      "low memory (1024MB): batch size and concurrency halved",
    ]);
  });

  it("never drops below the batch and concurrency floors", () => {
    const advice = adviseConfiguration({ totalSubjects: 10, memoryMb: 512 });

    expect(advice.batchSize).toBe(50);
    expect(advice.concurrencyLimit).toBe(2);
  });

  it("scales up under high memory without exceeding the caps", () => {
    const advice = adviseConfiguration({ totalSubjects: 150_000, memoryMb: 16_384 });

    expect(advice.batchSize).toBe(1500);
    expect(advice.concurrencyLimit).toBe(25);
  });

  it("throttles and trims concurrency under low bandwidth", () => {
    const advice = adviseConfiguration({ totalSubjects: 40_000, bandwidthMbps: 20 });

    expect(advice.throttleDelayMs).toBe(500);
    expect(advice.concurrencyLimit).toBe(7);
    expect(advice.warnings).toEqual([
      "low bandwidth (20Mbps): throttling mutations by 500ms",
    ]);
  });

  it("applies the memory modifier before the bandwidth modifier", () => {
    const advice = adviseConfiguration({
      totalSubjects: 90_000,
      memoryMb: 1024,
      bandwidthMbps: 10,
    });

    // 15 -> floor(7.5)=7 -> floor(4.9)=4
    expect(advice.concurrencyLimit).toBe(4);
    expect(advice.batchSize).toBe(375);
  });

  it("uses five-batch cleanup only for the largest tier", () => {
    expect(adviseConfiguration({ totalSubjects: 99_999 }).cleanupInterval).toBe(10);
    expect(adviseConfiguration({ totalSubjects: 100_000 }).cleanupInterval).toBe(5);
  });

  it("is deterministic for equal inputs", () => {
    const input = { totalSubjects: 12_345, memoryMb: 3000, bandwidthMbps: 75 };
    expect(adviseConfiguration(input)).toEqual(adviseConfiguration(input));
  });
});
