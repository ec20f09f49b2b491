/**
 * StatusReconciler resolves the current compliance status for every eligible subject.
 * Purpose: one aggregate status query per batch, degrading to per-subject queries when it fails.
 * Assumptions: the threshold check runs after each batch; a halt keeps what was reconciled so far.
 * Usage: const result = await new StatusReconciler(options).reconcile(subjects);
 */

import { iterateBatches, countBatches } from "../../core/batches.js";
import { ThresholdExceededError } from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logSweepEvent, type SweepLog } from "../../core/logger.js";
import { heapUsedMb, tryCollectGarbage } from "../../core/memory.js";
import {
  NO_TARGET_RESOURCE,
  type Batch,
  type EligibleSubject,
  type ReconciledSubject,
  type StatusRecord,
} from "../../core/model.js";

import type { ErrorThresholdMonitor, RunCounterStore } from "./error-threshold.js";
import type { StatusService } from "./ports.js";
import { buildProgressEvent, type ProgressListener } from "./progress.js";

// =============================================================================
// TYPES
// =============================================================================

export type StatusReconcilerOptions = {
  statusService: StatusService;
  monitor: ErrorThresholdMonitor;
  counters: RunCounterStore;
  log: SweepLog;
  batchSize: number;
  cleanupInterval: number;
  onProgress?: ProgressListener;
  memoryCleanup?: () => boolean;
};

export type ReconcileResult = {
  subjects: ReconciledSubject[];
  batchCount: number;
  fallbackBatches: number;
  halt: ThresholdExceededError | null;
};

// =============================================================================
// RECONCILER
// =============================================================================

export class StatusReconciler {
  private readonly memoryCleanup: () => boolean;

  constructor(private readonly options: StatusReconcilerOptions) {
    this.memoryCleanup = options.memoryCleanup ?? tryCollectGarbage;
  }

  async reconcile(subjects: readonly EligibleSubject[]): Promise<ReconcileResult> {
    const { batchSize, counters, monitor, log } = this.options;
    const batchCount = countBatches(subjects.length, batchSize);
    const reconciled: ReconciledSubject[] = [];
    let fallbackBatches = 0;

    logSweepEvent(log, "reconcile.start", {
      subjects: subjects.length,
      batch_size: batchSize,
      batches: batchCount,
    });

    for (const batch of iterateBatches(subjects, batchSize)) {
      const { records, usedFallback } = await this.resolveBatch(batch);
      if (usedFallback) fallbackBatches += 1;

      for (const subject of batch.items) {
        const status = records.get(subject.id) ?? NO_TARGET_RESOURCE;
        reconciled.push({ ...subject, status });
        if (status.complianceEnabled) {
          counters.increment("alreadyCompliant");
        }
      }
      counters.increment("processed", batch.items.length);

      this.options.onProgress?.(
        buildProgressEvent("reconcile", batch.index, batchCount, reconciled.length, subjects.length),
      );
      this.maybeCleanup(batch.index);

      try {
        monitor.check("reconcile", batch.index);
      } catch (error) {
        if (error instanceof ThresholdExceededError) {
          return { subjects: reconciled, batchCount, fallbackBatches, halt: error };
        }
        throw error;
      }
    }

    logSweepEvent(log, "reconcile.complete", {
      subjects: reconciled.length,
      fallback_batches: fallbackBatches,
      already_compliant: counters.get("alreadyCompliant"),
    });

    return { subjects: reconciled, batchCount, fallbackBatches, halt: null };
  }

  // ---------------------------------------------------------------------------

  private async resolveBatch(
    batch: Batch<EligibleSubject>,
  ): Promise<{ records: Map<string, StatusRecord>; usedFallback: boolean }> {
    const ids = batch.items.map((subject) => subject.id);

    try {
      const records = await this.options.statusService.getStatuses(ids);
      return { records, usedFallback: false };
    } catch (error) {
      logSweepEvent(this.options.log, "reconcile.batch.fallback", {
        batch: batch.index,
        size: batch.items.length,
        message: formatErrorMessage(error),
      });
    }

    return { records: await this.resolveIndividually(batch), usedFallback: true };
  }

  private async resolveIndividually(batch: Batch<EligibleSubject>): Promise<Map<string, StatusRecord>> {
    const records = new Map<string, StatusRecord>();

    for (const subject of batch.items) {
      try {
        const record = await this.options.statusService.getStatus(subject.id);
        records.set(subject.id, record ?? NO_TARGET_RESOURCE);
      } catch (error) {
        const message = formatErrorMessage(error);
        this.options.monitor.recordFailure({ phase: "reconcile", subjectId: subject.id, message });
        logSweepEvent(this.options.log, "reconcile.subject.failed", {
          subjectId: subject.id,
          batch: batch.index,
          message,
        });
        records.set(subject.id, NO_TARGET_RESOURCE);
      }
    }

    return records;
  }

  private maybeCleanup(batchIndex: number): void {
    const interval = this.options.cleanupInterval;
    if (interval < 1 || batchIndex % interval !== 0) return;

    const collected = this.memoryCleanup();
    logSweepEvent(this.options.log, "memory.cleanup", {
      batch: batchIndex,
      collected,
      heap_used_mb: heapUsedMb(),
    });
  }
}
