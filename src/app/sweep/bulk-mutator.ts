/**
 * BulkMutator enables the compliance flag for subjects that need it.
 * Purpose: apply (or preview) the change in small sub-batches through a bounded worker pool.
 * Assumptions: one mutation call per subject; a sub-batch fully settles before the next starts.
 * Usage: const result = await new BulkMutator(options).apply(subjectsNeedingAction);
 */

import { setTimeout as delay } from "node:timers/promises";

import { countBatches, iterateBatches } from "../../core/batches.js";
import { ThresholdExceededError } from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logSweepEvent, type SweepLog } from "../../core/logger.js";
import type { Batch, OperationOutcome, ReconciledSubject } from "../../core/model.js";

import type { ErrorThresholdMonitor, RunCounterStore } from "./error-threshold.js";
import type { Clock, StatusService } from "./ports.js";
import { buildProgressEvent, type ProgressListener } from "./progress.js";
import { runBounded, Semaphore } from "./worker-pool.js";

// Mutations are destructive; cap sub-batches well below the read batch size.
export const MUTATION_BATCH_CAP = 100;

// =============================================================================
// TYPES
// =============================================================================

export type BulkMutatorOptions = {
  statusService: StatusService;
  monitor: ErrorThresholdMonitor;
  counters: RunCounterStore;
  log: SweepLog;
  clock: Clock;
  batchSize: number;
  concurrencyLimit: number;
  throttleDelayMs: number;
  preview: boolean;
  onProgress?: ProgressListener;
  sleep?: (ms: number) => Promise<void>;
};

export type MutationResult = {
  outcomes: OperationOutcome[];
  subBatchCount: number;
  halt: ThresholdExceededError | null;
};

export function mutationBatchSize(batchSize: number): number {
  return Math.min(batchSize, MUTATION_BATCH_CAP);
}

// =============================================================================
// MUTATOR
// =============================================================================

export class BulkMutator {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: BulkMutatorOptions) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async apply(subjects: readonly ReconciledSubject[]): Promise<MutationResult> {
    if (subjects.length === 0) {
      return { outcomes: [], subBatchCount: 0, halt: null };
    }

    const { log, monitor, preview } = this.options;
    const size = mutationBatchSize(this.options.batchSize);
    const subBatchCount = countBatches(subjects.length, size);
    const semaphore = new Semaphore(this.options.concurrencyLimit);
    const outcomes: OperationOutcome[] = [];

    logSweepEvent(log, "mutate.start", {
      subjects: subjects.length,
      sub_batch_size: size,
      sub_batches: subBatchCount,
      concurrency: this.options.concurrencyLimit,
      preview,
    });

    for (const batch of iterateBatches(subjects, size)) {
      const batchOutcomes = preview
        ? this.previewBatch(batch)
        : await this.mutateBatch(batch, semaphore);
      outcomes.push(...batchOutcomes);

      const failed = batchOutcomes.filter((outcome) => !outcome.success).length;
      logSweepEvent(log, "mutate.batch.complete", {
        batch: batch.index,
        size: batch.items.length,
        failed,
      });
      this.options.onProgress?.(
        buildProgressEvent("mutate", batch.index, subBatchCount, outcomes.length, subjects.length),
      );

      try {
        monitor.check("mutate", batch.index);
      } catch (error) {
        if (error instanceof ThresholdExceededError) {
          return { outcomes, subBatchCount, halt: error };
        }
        throw error;
      }

      const hasMore = batch.index < subBatchCount;
      if (!preview && hasMore && this.options.throttleDelayMs > 0) {
        await this.sleep(this.options.throttleDelayMs);
      }
    }

    logSweepEvent(log, "mutate.complete", {
      outcomes: outcomes.length,
      newly_compliant: this.options.counters.get("newlyCompliant"),
      preview,
    });

    return { outcomes, subBatchCount, halt: null };
  }

  // ---------------------------------------------------------------------------

  private previewBatch(batch: Batch<ReconciledSubject>): OperationOutcome[] {
    const timestamp = this.options.clock.isoNow();
    return batch.items.map((subject) => ({
      subjectId: subject.id,
      success: true,
      timestamp,
      isPreview: true,
    }));
  }

  private async mutateBatch(
    batch: Batch<ReconciledSubject>,
    semaphore: Semaphore,
  ): Promise<OperationOutcome[]> {
    return runBounded(
      batch.items,
      semaphore.limit,
      (subject) => this.mutateSubject(subject),
      semaphore,
    );
  }

  private async mutateSubject(subject: ReconciledSubject): Promise<OperationOutcome> {
    const { statusService, counters, monitor, log, clock } = this.options;

    try {
      await statusService.setCompliance(subject.id, true);
      counters.increment("newlyCompliant");
      logSweepEvent(log, "mutate.subject.enabled", { subjectId: subject.id });
      return { subjectId: subject.id, success: true, timestamp: clock.isoNow(), isPreview: false };
    } catch (error) {
      const message = formatErrorMessage(error);
      monitor.recordFailure({ phase: "mutate", subjectId: subject.id, message });
      logSweepEvent(log, "mutate.subject.failed", { subjectId: subject.id, message });
      return {
        subjectId: subject.id,
        success: false,
        errorMessage: message,
        timestamp: clock.isoNow(),
        isPreview: false,
      };
    }
  }
}
