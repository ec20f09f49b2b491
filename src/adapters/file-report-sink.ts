/**
 * File report sink.
 * Purpose: persist the per-subject detail as CSV and the run summary as JSON.
 * Assumptions: one directory per run; files are overwritten if the run id repeats.
 * Usage: const sink = new FileReportSink(path.join(outputDir, runId), runId);
 */

import path from "node:path";

import type { ReportSink } from "../app/sweep/ports.js";
import type { ReportRow, RunSummary } from "../app/sweep/report.js";
import { writeJsonFile, writeTextFile } from "../core/utils.js";

// =============================================================================
// CSV
// =============================================================================

export const REPORT_CSV_COLUMNS = [
  "Identity",
  "Label",
  "Status",
  "HoldOwner",
  "HoldEnabledDate",
  "Licenses",
  "Action",
  "Error",
  "Timestamp",
  "Note",
] as const;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function rowToCsvFields(row: ReportRow): string[] {
  return [
    row.identity,
    row.label,
    row.status,
    row.holdOwner,
    row.holdEnabledDate,
    row.licenses.join(";"),
    row.action,
    row.error,
    row.timestamp,
    row.note,
  ];
}

export function renderReportCsv(rows: readonly ReportRow[]): string {
  const lines = [REPORT_CSV_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(rowToCsvFields(row).map(escapeCsvField).join(","));
  }
  return lines.join("\n") + "\n";
}

// =============================================================================
// SINK
// =============================================================================

export class FileReportSink implements ReportSink {
  constructor(
    readonly directory: string,
    private readonly runId: string,
  ) {}

  get detailPath(): string {
    return path.join(this.directory, `holdsweep-${this.runId}.csv`);
  }

  get summaryPath(): string {
    return path.join(this.directory, `holdsweep-${this.runId}.summary.json`);
  }

  async writeDetail(rows: readonly ReportRow[]): Promise<string> {
    await writeTextFile(this.detailPath, renderReportCsv(rows));
    return this.detailPath;
  }

  async writeSummary(summary: RunSummary): Promise<string> {
    await writeJsonFile(this.summaryPath, summary);
    return this.summaryPath;
  }
}
