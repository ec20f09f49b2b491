import { describe, expect, it } from "vitest";

import type { RunSummary } from "../app/sweep/report.js";

import {
  ConsoleReporter,
  formatElapsed,
  formatProgressLine,
  formatSummaryLines,
  type ConsoleLike,
} from "./console-reporter.js";

function capture(): { lines: string[]; out: ConsoleLike } {
  const lines: string[] = [];
  const push = (message: string): void => {
    lines.push(message);
  };
  return { lines, out: { log: push, warn: push, error: push } };
}

const SUMMARY: RunSummary = {
  runId: "run-1",
  preview: false,
  startedAt: "2026-01-15T09:00:00.000Z",
  finishedAt: "2026-01-15T09:01:05.000Z",
  elapsedMs: 65_000,
  discovered: 5,
  skipped: 2,
  totalEligible: 3,
  processed: 3,
  alreadyCompliant: 1,
  newlyEnabled: 1,
  wouldEnable: 0,
  failed: 1,
  noTargetResource: 0,
  noActionRequired: 0,
  totalErrors: 1,
  halted: false,
};

describe("ConsoleReporter", () => {
  it("filters by level", () => {
    const { lines, out } = capture();
    const reporter = new ConsoleReporter("warn", out);

    reporter.debug("d");
    reporter.info("i");
    reporter.warn("w");
    reporter.error("e");

    expect(lines).toEqual(["Warning: w", "e"]);
  });

  it("prefixes debug output", () => {
    const { lines, out } = capture();

    new ConsoleReporter("debug", out).debug("details");

    expect(lines).toEqual(["[debug] details"]);
  });

  it("prints advice warnings after the recommendation", () => {
    const { lines, out } = capture();

    new ConsoleReporter("info", out).advice({
      batchSize: 100,
      concurrencyLimit: 5,
      cleanupInterval: 10,
      throttleDelayMs: 500,
      recommendedWindow: "any",
      warnings: ["low bandwidth (20Mbps): throttling mutations by 500ms"],
    });

    expect(lines).toEqual([
      "Batch size 100, concurrency 5, cleanup every 10 batches, throttle 500ms (window: any)",
      "Warning: low bandwidth (20Mbps): throttling mutations by 500ms",
    ]);
  });

  it("prints the summary even at error level", () => {
    const { lines, out } = capture();

    new ConsoleReporter("error", out).summary(SUMMARY);

    expect(lines[0]).toBe("Run run-1 (live) summary:");
  });
});

describe("formatProgressLine", () => {
  it("labels each phase", () => {
    expect(
      formatProgressLine({ phase: "reconcile", batchIndex: 1, batchCount: 2, processed: 2, total: 3, percent: 66 }),
    ).toBe("Reconciling status: batch 1/2 (2/3, 66%)");
    expect(
      formatProgressLine({ phase: "mutate", batchIndex: 3, batchCount: 3, processed: 250, total: 250, percent: 100 }),
    ).toBe("Applying hold: batch 3/3 (250/250, 100%)");
  });
});

describe("formatSummaryLines", () => {
  it("shows newly enabled for live runs", () => {
    expect(formatSummaryLines(SUMMARY)).toEqual([
      "Run run-1 (live) summary:",
      "  Discovered:          5",
      "  Skipped:             2",
      "  Eligible:            3",
      "  Already compliant:   1",
      "  Newly enabled:       1",
      "  Failed:              1",
      "  No mailbox:          0",
      "  No action required:  0",
      "  Errors:              1",
      "  Elapsed:             1m 5s",
    ]);
  });

  it("shows would-enable and the halt reason", () => {
    const lines = formatSummaryLines({
      ...SUMMARY,
      preview: true,
      wouldEnable: 2,
      halted: true,
      haltReason: "Error threshold exceeded during reconcile batch 1: 1 errors (max 0).",
    });

    expect(lines[0]).toBe("Run run-1 (preview) summary:");
    expect(lines[5]).toBe("  Would enable:        2");
    expect(lines.at(-1)).toBe(
      "  Halted:              Error threshold exceeded during reconcile batch 1: 1 errors (max 0).",
    );
  });
});

describe("formatElapsed", () => {
  it("rounds to whole seconds", () => {
    expect(formatElapsed(4_400)).toBe("4s");
    expect(formatElapsed(125_600)).toBe("2m 6s");
  });
});
