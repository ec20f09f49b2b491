import { describe, expect, it } from "vitest";

import { ThresholdExceededError } from "../../core/errors.js";
import { MemoryLog } from "../../core/logger.js";

import { ErrorThresholdMonitor, RunCounterStore } from "./error-threshold.js";

function recordFailures(monitor: ErrorThresholdMonitor, count: number): void {
  for (let i = 0; i < count; i += 1) {
    monitor.recordFailure({ phase: "mutate", subjectId: `user${i}@contoso.test`, message: "boom" });
  }
}

describe("RunCounterStore", () => {
  it("only grows", () => {
    const counters = new RunCounterStore();
    counters.increment("processed", 3);
    counters.increment("processed");

    expect(counters.get("processed")).toBe(4);
    expect(() => counters.increment("processed", -1)).toThrow(/can only grow/);
  });

  it("returns detached snapshots", () => {
    const counters = new RunCounterStore();
    const snapshot = counters.snapshot();
    counters.recordError();

    expect(snapshot.errors).toBe(0);
    expect(counters.get("errors")).toBe(1);
  });
});

describe("ErrorThresholdMonitor", () => {
  it("does not abort while errors equal the maximum", () => {
    const monitor = new ErrorThresholdMonitor(new RunCounterStore(), {
      maxErrors: 2,
      continueOnErrors: false,
    });
    recordFailures(monitor, 2);

    expect(monitor.shouldAbort()).toBe(false);
    expect(() => monitor.check("mutate", 1)).not.toThrow();
  });

  it("throws once errors exceed the maximum", () => {
    const log = new MemoryLog("run-1");
    const monitor = new ErrorThresholdMonitor(
      new RunCounterStore(),
      { maxErrors: 2, continueOnErrors: false },
      log,
    );
    recordFailures(monitor, 3);

    let thrown: unknown;
    try {
      monitor.check("reconcile", 4);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ThresholdExceededError);
    expect(thrown).toMatchObject({ errors: 3, maxErrors: 2, phase: "reconcile", batchIndex: 4 });
    expect(log.ofType("threshold.exceeded")).toHaveLength(1);
    expect(log.ofType("error.recorded")).toHaveLength(3);
  });

  it("never aborts with continueOnErrors and logs the suppression once", () => {
    const log = new MemoryLog("run-1");
    const monitor = new ErrorThresholdMonitor(
      new RunCounterStore(),
      { maxErrors: 0, continueOnErrors: true },
      log,
    );
    recordFailures(monitor, 5);

    expect(monitor.shouldAbort()).toBe(false);
    expect(() => monitor.check("mutate", 1)).not.toThrow();
    expect(() => monitor.check("mutate", 2)).not.toThrow();
    expect(monitor.suppressed).toBe(true);
    expect(log.ofType("threshold.suppressed")).toHaveLength(1);
    expect(log.ofType("threshold.suppressed")[0]?.payload).toEqual({
      phase: "mutate",
      batch: 1,
      errors: 5,
      max_errors: 0,
    });
  });

  it("attaches the subject id to recorded errors", () => {
    const log = new MemoryLog("run-1");
    const monitor = new ErrorThresholdMonitor(
      new RunCounterStore(),
      { maxErrors: 10, continueOnErrors: false },
      log,
    );
    monitor.recordFailure({ phase: "reconcile", subjectId: "a@contoso.test", message: "nope" });

    expect(log.events[0]).toMatchObject({
      type: "error.recorded",
      run_id: "run-1",
      subject_id: "a@contoso.test",
      payload: { phase: "reconcile", message: "nope", errors: 1 },
    });
  });
});
