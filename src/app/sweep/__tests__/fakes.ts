import type { EligibleSubject, ReconciledSubject, StatusRecord, Subject } from "../../../core/model.js";
import type { Clock, DirectorySource, ReportSink, StatusService } from "../ports.js";
import type { ReportRow, RunSummary } from "../report.js";

// =============================================================================
// DIRECTORY
// =============================================================================

export class FakeDirectorySource implements DirectorySource {
  readonly filters: Array<string | undefined> = [];

  constructor(
    private readonly subjects: Subject[],
    private readonly catalog: Record<string, string> = {},
  ) {}

  async listSubjects(filter?: string): Promise<Subject[]> {
    this.filters.push(filter);
    if (!filter) return this.subjects;
    const prefix = filter.toLowerCase();
    return this.subjects.filter((subject) => subject.id.toLowerCase().startsWith(prefix));
  }

  async listLicenseCatalog(): Promise<Record<string, string>> {
    return this.catalog;
  }
}

// =============================================================================
// STATUS SERVICE
// =============================================================================

export type FakeStatusOptions = {
  /** Every getStatuses call rejects. */
  failBatchQuery?: boolean;
  /** getStatus rejects for these ids. */
  failLookup?: string[];
  /** setCompliance rejects for these ids. */
  failMutation?: string[];
  mutationDelayMs?: number;
};

export class FakeStatusService implements StatusService {
  readonly batchCalls: string[][] = [];
  readonly lookupCalls: string[] = [];
  readonly mutationCalls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly records: Map<string, StatusRecord>,
    private readonly options: FakeStatusOptions = {},
  ) {}

  async getStatuses(ids: readonly string[]): Promise<Map<string, StatusRecord>> {
    this.batchCalls.push([...ids]);
    if (this.options.failBatchQuery) {
      throw new Error("batch query unavailable");
    }
    const found = new Map<string, StatusRecord>();
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) found.set(id, record);
    }
    return found;
  }

  async getStatus(id: string): Promise<StatusRecord | null> {
    this.lookupCalls.push(id);
    if (this.options.failLookup?.includes(id)) {
      throw new Error(`lookup failed for ${id}`);
    }
    return this.records.get(id) ?? null;
  }

  async setCompliance(id: string): Promise<void> {
    this.mutationCalls.push(id);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.options.mutationDelayMs ?? 1));
      if (this.options.failMutation?.includes(id)) {
        throw new Error(`Set-Mailbox failed for ${id}`);
      }
    } finally {
      this.inFlight -= 1;
    }
  }
}

// =============================================================================
// REPORT SINK / CLOCK
// =============================================================================

export class MemoryReportSink implements ReportSink {
  rows: ReportRow[] = [];
  summary: RunSummary | null = null;

  async writeDetail(rows: readonly ReportRow[]): Promise<string> {
    this.rows = [...rows];
    return "memory://detail.csv";
  }

  async writeSummary(summary: RunSummary): Promise<string> {
    this.summary = summary;
    return "memory://summary.json";
  }
}

export const FIXED_NOW = "2026-01-15T09:30:00.000Z";

export const fixedClock: Clock = {
  now: () => new Date(FIXED_NOW),
  isoNow: () => FIXED_NOW,
};

// =============================================================================
// BUILDERS
// =============================================================================

export function subject(id: string, overrides: Partial<Subject> = {}): Subject {
  return { id, label: id.split("@")[0] ?? id, enabled: true, skus: ["SPE_E3"], ...overrides };
}

export function eligible(id: string, overrides: Partial<Subject> = {}): EligibleSubject {
  const base = subject(id, overrides);
  return { ...base, eligibleSkus: [...base.skus] };
}

export function reconciled(id: string, status: StatusRecord): ReconciledSubject {
  return { ...eligible(id), status };
}

export const HOLD_ON: StatusRecord = {
  complianceEnabled: true,
  hasTargetResource: true,
  enabledDate: "2025-06-01T00:00:00.0000000Z",
  owner: "legal@contoso.test",
};

export const HOLD_OFF: StatusRecord = { complianceEnabled: false, hasTargetResource: true };
