/**
 * SweepEngine drives one compliance sweep from discovery to report.
 * Purpose: sequence preconditions, discovery, eligibility, reconciliation, mutation and reporting.
 * Assumptions: single coordinator; a threshold halt or a declined confirmation still yields a report,
 * and a halted run returns its result even when the report sink fails.
 * Usage: const result = await new SweepEngine(ports, log).run(options);
 */

import {
  adviseConfiguration,
  type AdvisorInput,
  type ConfigurationAdvice,
} from "../../core/advisor.js";
import {
  DirectoryError,
  PreconditionError,
  SweepError,
  type ThresholdExceededError,
} from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { findUnknownSkus, selectEligibleSubjects } from "../../core/eligibility.js";
import { logSweepEvent, type SweepLog } from "../../core/logger.js";
import {
  requiresAction,
  type LicenseTable,
  type OperationOutcome,
  type Subject,
} from "../../core/model.js";

import { BulkMutator } from "./bulk-mutator.js";
import { ErrorThresholdMonitor, RunCounterStore } from "./error-threshold.js";
import { systemClock, type Clock, type SweepPorts } from "./ports.js";
import type { ProgressListener } from "./progress.js";
import { aggregateReport, type AggregatedReport } from "./report.js";
import { StatusReconciler } from "./status-reconciler.js";

// =============================================================================
// TYPES
// =============================================================================

export type SweepRunOptions = {
  runId: string;
  preview: boolean;
  licenseTable: LicenseTable;
  identityFilter?: string;
  licenseFilter?: string;
  /** Explicit overrides; replace the advised values when set. */
  batchSize?: number;
  concurrencyLimit?: number;
  maxErrors: number;
  continueOnErrors: boolean;
  hints?: Omit<AdvisorInput, "totalSubjects">;
  onProgress?: ProgressListener;
  onAdvice?: (advice: ConfigurationAdvice) => void;
  /** Asked once before live mutation starts; returning false cancels the run. */
  confirmMutation?: (plan: MutationPlan) => Promise<boolean>;
};

export type MutationPlan = {
  runId: string;
  totalEligible: number;
  needsAction: number;
  alreadyCompliant: number;
};

export type SweepRunStatus = "completed" | "halted" | "cancelled";

export type SweepReportPaths = {
  detail: string;
  summary: string;
};

export type SweepRunResult = {
  status: SweepRunStatus;
  advice: ConfigurationAdvice;
  report: AggregatedReport;
  halt: ThresholdExceededError | null;
  reportPaths: SweepReportPaths | null;
  thresholdSuppressed: boolean;
};

// =============================================================================
// ENGINE
// =============================================================================

export class SweepEngine {
  private readonly clock: Clock;

  constructor(
    private readonly ports: SweepPorts,
    private readonly log: SweepLog,
  ) {
    this.clock = ports.clock ?? systemClock;
  }

  async run(options: SweepRunOptions): Promise<SweepRunResult> {
    const startedAt = this.clock.now();
    const counters = new RunCounterStore();
    const monitor = new ErrorThresholdMonitor(
      counters,
      { maxErrors: options.maxErrors, continueOnErrors: options.continueOnErrors },
      this.log,
    );

    logSweepEvent(this.log, "run.start", {
      preview: options.preview,
      max_errors: options.maxErrors,
      continue_on_errors: options.continueOnErrors,
      identity_filter: options.identityFilter ?? null,
      license_filter: options.licenseFilter ?? null,
    });

    await this.verifyPreconditions();

    const discovered = await this.discoverSubjects(options);
    const { eligible, skipped } = selectEligibleSubjects(discovered, {
      table: options.licenseTable,
      licenseFilter: options.licenseFilter,
    });
    counters.increment("skipped", skipped.length);
    counters.increment("eligible", eligible.length);
    logSweepEvent(this.log, "eligibility.complete", {
      discovered: discovered.length,
      eligible: eligible.length,
      skipped: skipped.length,
    });

    const advice = resolveRunAdvice(eligible.length, options);
    options.onAdvice?.(advice);
    logSweepEvent(this.log, "advice.resolved", {
      batch_size: advice.batchSize,
      concurrency: advice.concurrencyLimit,
      cleanup_interval: advice.cleanupInterval,
      throttle_delay_ms: advice.throttleDelayMs,
      recommended_window: advice.recommendedWindow,
      warnings: advice.warnings,
    });

    const reconciler = new StatusReconciler({
      statusService: this.ports.statusService,
      monitor,
      counters,
      log: this.log,
      batchSize: advice.batchSize,
      cleanupInterval: advice.cleanupInterval,
      onProgress: options.onProgress,
    });
    const reconciled = await reconciler.reconcile(eligible);

    let status: SweepRunStatus = "completed";
    let halt = reconciled.halt;
    let outcomes: OperationOutcome[] = [];

    if (halt) {
      status = "halted";
    } else {
      const needsAction = reconciled.subjects.filter(requiresAction);
      const proceed = await this.confirm(options, {
        runId: options.runId,
        totalEligible: eligible.length,
        needsAction: needsAction.length,
        alreadyCompliant: counters.get("alreadyCompliant"),
      });

      if (proceed) {
        const mutator = new BulkMutator({
          statusService: this.ports.statusService,
          monitor,
          counters,
          log: this.log,
          clock: this.clock,
          batchSize: advice.batchSize,
          concurrencyLimit: advice.concurrencyLimit,
          throttleDelayMs: advice.throttleDelayMs,
          preview: options.preview,
          onProgress: options.onProgress,
        });
        const mutation = await mutator.apply(needsAction);
        outcomes = mutation.outcomes;
        halt = mutation.halt;
        if (halt) status = "halted";
      } else {
        status = "cancelled";
        logSweepEvent(this.log, "run.cancelled", { needs_action: needsAction.length });
      }
    }

    const report = aggregateReport({
      runId: options.runId,
      preview: options.preview,
      population: eligible,
      reconciled: reconciled.subjects,
      outcomes,
      counters: counters.snapshot(),
      discovered: discovered.length,
      startedAt,
      finishedAt: this.clock.now(),
      haltReason: halt?.message,
    });
    let reportPaths: SweepReportPaths | null = null;
    try {
      reportPaths = await this.writeReport(report);
    } catch (error) {
      logSweepEvent(this.log, "report.failed", { message: formatErrorMessage(error) });
      // A halted run still returns its summary; the halt is the error the caller reports.
      if (!halt) {
        throw new SweepError(`Report write failed: ${formatErrorMessage(error)}`, error);
      }
    }

    logSweepEvent(this.log, "run.complete", {
      status,
      already_compliant: report.summary.alreadyCompliant,
      newly_enabled: report.summary.newlyEnabled,
      would_enable: report.summary.wouldEnable,
      failed: report.summary.failed,
      errors: report.summary.totalErrors,
      elapsed_ms: report.summary.elapsedMs,
    });

    return {
      status,
      advice,
      report,
      halt,
      reportPaths,
      thresholdSuppressed: monitor.suppressed,
    };
  }

  // ---------------------------------------------------------------------------

  private async verifyPreconditions(): Promise<void> {
    for (const check of this.ports.preconditions ?? []) {
      try {
        await check.verify();
      } catch (error) {
        logSweepEvent(this.log, "precondition.failed", {
          check: check.name,
          message: formatErrorMessage(error),
        });
        if (error instanceof PreconditionError) throw error;
        throw new PreconditionError(
          `Precondition "${check.name}" failed: ${formatErrorMessage(error)}`,
          check.name,
          error,
        );
      }
    }
  }

  private async discoverSubjects(options: SweepRunOptions): Promise<Subject[]> {
    let subjects: Subject[];
    let catalog: Record<string, string>;
    try {
      subjects = await this.ports.directory.listSubjects(options.identityFilter);
      catalog = await this.ports.directory.listLicenseCatalog();
    } catch (error) {
      throw new DirectoryError(`Directory enumeration failed: ${formatErrorMessage(error)}`, error);
    }

    const unknownSkus = findUnknownSkus(catalog, options.licenseTable);
    if (unknownSkus.length > 0) {
      logSweepEvent(this.log, "licenses.unknown_skus", { skus: unknownSkus });
    }

    const { unique, duplicates } = dedupeSubjects(subjects);
    if (duplicates.length > 0) {
      logSweepEvent(this.log, "directory.duplicates", { ids: duplicates });
    }
    logSweepEvent(this.log, "directory.listed", { subjects: unique.length });
    return unique;
  }

  private async confirm(options: SweepRunOptions, plan: MutationPlan): Promise<boolean> {
    if (options.preview || plan.needsAction === 0 || !options.confirmMutation) {
      return true;
    }
    return options.confirmMutation(plan);
  }

  private async writeReport(report: AggregatedReport): Promise<SweepReportPaths | null> {
    const sink = this.ports.reportSink;
    if (!sink) return null;

    const detail = await sink.writeDetail(report.rows);
    const summary = await sink.writeSummary(report.summary);
    logSweepEvent(this.log, "report.written", { detail, summary });
    return { detail, summary };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function resolveRunAdvice(
  totalSubjects: number,
  options: Pick<SweepRunOptions, "hints" | "batchSize" | "concurrencyLimit">,
): ConfigurationAdvice {
  const advice = adviseConfiguration({ totalSubjects, ...options.hints });
  return {
    ...advice,
    batchSize: options.batchSize ?? advice.batchSize,
    concurrencyLimit: options.concurrencyLimit ?? advice.concurrencyLimit,
  };
}

export function dedupeSubjects(subjects: readonly Subject[]): {
  unique: Subject[];
  duplicates: string[];
} {
  const seen = new Set<string>();
  const unique: Subject[] = [];
  const duplicates: string[] = [];

  for (const subject of subjects) {
    const key = subject.id.toLowerCase();
    if (seen.has(key)) {
      duplicates.push(subject.id);
      continue;
    }
    seen.add(key);
    unique.push(subject);
  }

  return { unique, duplicates };
}
