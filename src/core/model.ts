/**
 * Core sweep data model.
 * Subjects are created by directory enumeration and never mutated during a run;
 * later phases attach status and outcomes in new objects.
 */

// =============================================================================
// SUBJECTS
// =============================================================================

export type Subject = {
  /** Unique principal key (user principal name). */
  id: string;
  label: string;
  enabled: boolean;
  skus: string[];
};

export type StatusRecord = {
  complianceEnabled: boolean;
  enabledDate?: string;
  owner?: string;
  hasTargetResource: boolean;
};

export type EligibleSubject = Subject & {
  eligibleSkus: string[];
};

export type ReconciledSubject = EligibleSubject & {
  status: StatusRecord;
};

export const NO_TARGET_RESOURCE: StatusRecord = Object.freeze({
  complianceEnabled: false,
  hasTargetResource: false,
});

export function requiresAction(subject: ReconciledSubject): boolean {
  return !subject.status.complianceEnabled && subject.status.hasTargetResource;
}

// =============================================================================
// LICENSES
// =============================================================================

export type EligibleLicense = {
  skuId: string;
  displayName: string;
  category: string;
  litigationHoldSupported: boolean;
};

export type LicenseTable = ReadonlyMap<string, EligibleLicense>;

// =============================================================================
// OUTCOMES
// =============================================================================

export type OperationOutcome = {
  subjectId: string;
  success: boolean;
  errorMessage?: string;
  timestamp: string;
  isPreview: boolean;
};

export type Batch<T> = {
  /** 1-based position of the batch in its sequence. */
  index: number;
  items: T[];
};
