/**
 * Report aggregation.
 * Purpose: join reconciled status with mutation outcomes into one classified row per subject.
 * Assumptions: the population is the eligible subject set; every member gets exactly one row.
 * Usage: const { rows, summary } = aggregateReport({ population, reconciled, outcomes, ... });
 */

import type {
  EligibleSubject,
  OperationOutcome,
  ReconciledSubject,
  StatusRecord,
} from "../../core/model.js";

import type { RunCounters } from "./error-threshold.js";

// =============================================================================
// TYPES
// =============================================================================

export const REPORT_ACTIONS = [
  "already_compliant",
  "no_target_resource",
  "preview_would_enable",
  "enabled",
  "failed",
  "no_action_required",
] as const;

export type ReportAction = (typeof REPORT_ACTIONS)[number];

export type ReportStatus = "hold_enabled" | "hold_disabled" | "no_mailbox" | "unknown";

export const HALTED_NOTE = "run halted before this subject was processed";

export type ReportRow = {
  identity: string;
  label: string;
  status: ReportStatus;
  holdOwner: string;
  holdEnabledDate: string;
  licenses: string[];
  action: ReportAction;
  error: string;
  timestamp: string;
  note: string;
};

export type RunSummary = {
  runId: string;
  preview: boolean;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  discovered: number;
  skipped: number;
  totalEligible: number;
  processed: number;
  alreadyCompliant: number;
  newlyEnabled: number;
  wouldEnable: number;
  failed: number;
  noTargetResource: number;
  noActionRequired: number;
  totalErrors: number;
  halted: boolean;
  haltReason?: string;
};

export type AggregateReportInput = {
  runId: string;
  preview: boolean;
  population: readonly EligibleSubject[];
  reconciled: readonly ReconciledSubject[];
  outcomes: readonly OperationOutcome[];
  counters: RunCounters;
  discovered: number;
  startedAt: Date;
  finishedAt: Date;
  haltReason?: string;
};

export type AggregatedReport = {
  rows: ReportRow[];
  summary: RunSummary;
};

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function classifySubject(
  status: StatusRecord | undefined,
  outcome: OperationOutcome | undefined,
): ReportAction {
  if (status?.complianceEnabled) return "already_compliant";
  if (status && !status.hasTargetResource) return "no_target_resource";
  if (outcome?.isPreview) return "preview_would_enable";
  if (outcome?.success) return "enabled";
  if (outcome) return "failed";
  return "no_action_required";
}

function describeStatus(status: StatusRecord | undefined): ReportStatus {
  if (!status) return "unknown";
  if (!status.hasTargetResource) return "no_mailbox";
  return status.complianceEnabled ? "hold_enabled" : "hold_disabled";
}

// =============================================================================
// AGGREGATION
// =============================================================================

export function aggregateReport(input: AggregateReportInput): AggregatedReport {
  const statusById = new Map(input.reconciled.map((subject) => [subject.id, subject.status]));
  const outcomeById = new Map(input.outcomes.map((outcome) => [outcome.subjectId, outcome]));
  const halted = input.haltReason !== undefined;

  const rows = input.population.map((subject) => {
    const status = statusById.get(subject.id);
    const outcome = outcomeById.get(subject.id);
    const action = classifySubject(status, outcome);
    const notAttempted = halted && action === "no_action_required";

    return {
      identity: subject.id,
      label: subject.label,
      status: describeStatus(status),
      holdOwner: status?.owner ?? "",
      holdEnabledDate: status?.enabledDate ?? "",
      licenses: subject.eligibleSkus,
      action,
      error: outcome?.errorMessage ?? "",
      timestamp: outcome?.timestamp ?? "",
      note: notAttempted ? HALTED_NOTE : "",
    } satisfies ReportRow;
  });

  const countOf = (action: ReportAction): number =>
    rows.filter((row) => row.action === action).length;

  const summary: RunSummary = {
    runId: input.runId,
    preview: input.preview,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    elapsedMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    discovered: input.discovered,
    skipped: input.counters.skipped,
    totalEligible: input.population.length,
    processed: input.counters.processed,
    alreadyCompliant: countOf("already_compliant"),
    newlyEnabled: countOf("enabled"),
    wouldEnable: countOf("preview_would_enable"),
    failed: countOf("failed"),
    noTargetResource: countOf("no_target_resource"),
    noActionRequired: countOf("no_action_required"),
    totalErrors: input.counters.errors,
    halted,
  };
  if (input.haltReason !== undefined) {
    summary.haltReason = input.haltReason;
  }

  return { rows, summary };
}
