/**
 * Run counters and the error-threshold circuit breaker.
 * Purpose: own every counter mutation for a run and decide when accumulated failures halt it.
 * Assumptions: phases call check() only at batch/sub-batch boundaries, never mid-batch.
 * Usage: const monitor = new ErrorThresholdMonitor(counters, policy, log); monitor.check("mutate", 3);
 */

import { ThresholdExceededError, type ThresholdPhase } from "../../core/errors.js";
import { logSweepEvent, type SweepLog } from "../../core/logger.js";

// =============================================================================
// RUN COUNTERS
// =============================================================================

export type RunCounters = {
  processed: number;
  eligible: number;
  alreadyCompliant: number;
  newlyCompliant: number;
  errors: number;
  skipped: number;
};

export type PhaseCounter = Exclude<keyof RunCounters, "errors">;

export function createRunCounters(): RunCounters {
  return {
    processed: 0,
    eligible: 0,
    alreadyCompliant: 0,
    newlyCompliant: 0,
    errors: 0,
    skipped: 0,
  };
}

export class RunCounterStore {
  private readonly counters = createRunCounters();

  increment(name: PhaseCounter, by = 1): void {
    assertNonNegative(name, by);
    this.counters[name] += by;
  }

  get(name: keyof RunCounters): number {
    return this.counters[name];
  }

  snapshot(): RunCounters {
    return { ...this.counters };
  }

  /** Only the threshold monitor records errors, so `errors` never decreases. */
  recordError(): number {
    this.counters.errors += 1;
    return this.counters.errors;
  }
}

function assertNonNegative(name: string, by: number): void {
  if (!Number.isInteger(by) || by < 0) {
    throw new Error(`counter ${name} can only grow (received ${by})`);
  }
}

// =============================================================================
// ERROR THRESHOLD MONITOR
// =============================================================================

export type ThresholdPolicy = {
  maxErrors: number;
  continueOnErrors: boolean;
};

export type FailureContext = {
  phase: ThresholdPhase;
  subjectId: string;
  message: string;
};

export class ErrorThresholdMonitor {
  private suppressionLogged = false;

  constructor(
    private readonly counters: RunCounterStore,
    readonly policy: ThresholdPolicy,
    private readonly log?: SweepLog,
  ) {}

  get errors(): number {
    return this.counters.get("errors");
  }

  recordFailure(context: FailureContext): void {
    const errors = this.counters.recordError();
    if (this.log) {
      logSweepEvent(this.log, "error.recorded", {
        subjectId: context.subjectId,
        phase: context.phase,
        message: context.message,
        errors,
      });
    }
  }

  shouldAbort(): boolean {
    return this.errors > this.policy.maxErrors && !this.policy.continueOnErrors;
  }

  /** Boundary check; throws ThresholdExceededError when the run must halt. */
  check(phase: ThresholdPhase, batchIndex: number): void {
    const errors = this.errors;
    const exceeded = errors > this.policy.maxErrors;

    if (exceeded && this.policy.continueOnErrors) {
      if (!this.suppressionLogged && this.log) {
        logSweepEvent(this.log, "threshold.suppressed", {
          phase,
          batch: batchIndex,
          errors,
          max_errors: this.policy.maxErrors,
        });
      }
      this.suppressionLogged = true;
      return;
    }

    if (!this.shouldAbort()) return;

    if (this.log) {
      logSweepEvent(this.log, "threshold.exceeded", {
        phase,
        batch: batchIndex,
        errors,
        max_errors: this.policy.maxErrors,
      });
    }
    throw new ThresholdExceededError({
      errors,
      maxErrors: this.policy.maxErrors,
      phase,
      batchIndex,
    });
  }

  get suppressed(): boolean {
    return this.suppressionLogged;
  }
}
