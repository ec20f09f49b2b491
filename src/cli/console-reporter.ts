/*
Purpose: human-readable console output for sweep runs, filtered by --log-level.
Assumptions: structured detail goes to the JSONL run log; the console gets progress and summaries.
Usage: const reporter = new ConsoleReporter("info"); reporter.progress(event);
*/

import type { ConfigurationAdvice } from "../core/advisor.js";
import type { LogLevel } from "../core/config.js";
import type { ProgressEvent } from "../app/sweep/progress.js";
import type { RunSummary } from "../app/sweep/report.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConsoleLike = {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

// =============================================================================
// REPORTER
// =============================================================================

export class ConsoleReporter {
  constructor(
    readonly level: LogLevel = "info",
    private readonly out: ConsoleLike = console,
  ) {}

  enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
  }

  error(message: string): void {
    if (this.enabled("error")) this.out.error(message);
  }

  warn(message: string): void {
    if (this.enabled("warn")) this.out.warn(`Warning: ${message}`);
  }

  info(message: string): void {
    if (this.enabled("info")) this.out.log(message);
  }

  debug(message: string): void {
    if (this.enabled("debug")) this.out.log(`[debug] ${message}`);
  }

  progress(event: ProgressEvent): void {
    this.info(formatProgressLine(event));
  }

  advice(advice: ConfigurationAdvice): void {
    this.info(
      `Batch size ${advice.batchSize}, concurrency ${advice.concurrencyLimit}, ` +
        `cleanup every ${advice.cleanupInterval} batches, throttle ${advice.throttleDelayMs}ms ` +
        `(window: ${advice.recommendedWindow})`,
    );
    for (const warning of advice.warnings) {
      this.warn(warning);
    }
  }

  summary(summary: RunSummary): void {
    for (const line of formatSummaryLines(summary)) {
      this.out.log(line);
    }
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatProgressLine(event: ProgressEvent): string {
  const label = event.phase === "reconcile" ? "Reconciling status" : "Applying hold";
  return `${label}: batch ${event.batchIndex}/${event.batchCount} (${event.processed}/${event.total}, ${event.percent}%)`;
}

export function formatSummaryLines(summary: RunSummary): string[] {
  const mode = summary.preview ? "preview" : "live";
  const lines = [
    `Run ${summary.runId} (${mode}) summary:`,
    `  Discovered:          ${summary.discovered}`,
    `  Skipped:             ${summary.skipped}`,
    `  Eligible:            ${summary.totalEligible}`,
    `  Already compliant:   ${summary.alreadyCompliant}`,
    summary.preview
      ? `  Would enable:        ${summary.wouldEnable}`
      : `  Newly enabled:       ${summary.newlyEnabled}`,
    `  Failed:              ${summary.failed}`,
    `  No mailbox:          ${summary.noTargetResource}`,
    `  No action required:  ${summary.noActionRequired}`,
    `  Errors:              ${summary.totalErrors}`,
    `  Elapsed:             ${formatElapsed(summary.elapsedMs)}`,
  ];

  if (summary.halted) {
    lines.push(`  Halted:              ${summary.haltReason ?? "yes"}`);
  }

  return lines;
}

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}
