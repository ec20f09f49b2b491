/**
 * Sweep ports define the boundary between the sweep engine and external services.
 * Purpose: keep directory, status and report I/O replaceable for tests.
 * Assumptions: adapters own paging, authentication and call-level deadlines.
 * Usage: implement in src/adapters and pass into new SweepEngine().
 */

import type { StatusRecord, Subject } from "../../core/model.js";

import type { ReportRow, RunSummary } from "./report.js";

// =============================================================================
// PORTS
// =============================================================================

export interface DirectorySource {
  /** `filter` is an identity prefix; paging is handled by the adapter. */
  listSubjects(filter?: string): Promise<Subject[]>;
  /** skuId -> sku part number. */
  listLicenseCatalog(): Promise<Record<string, string>>;
}

export interface StatusService {
  /** Aggregate query; identities missing from the result have no target resource. */
  getStatuses(ids: readonly string[]): Promise<Map<string, StatusRecord>>;
  /** Single-subject fallback; `null` means no target resource. */
  getStatus(id: string): Promise<StatusRecord | null>;
  /** The only mutating call. */
  setCompliance(id: string, enabled: true): Promise<void>;
}

export interface ReportSink {
  writeDetail(rows: readonly ReportRow[]): Promise<string>;
  writeSummary(summary: RunSummary): Promise<string>;
}

export interface PreconditionCheck {
  name: string;
  verify(): Promise<void>;
}

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

export type SweepPorts = {
  directory: DirectorySource;
  statusService: StatusService;
  reportSink?: ReportSink;
  preconditions?: PreconditionCheck[];
  clock?: Clock;
};
