import { minimatch } from "minimatch";

import { findEligibleSkus } from "./license-table.js";
import type { EligibleSubject, LicenseTable, Subject } from "./model.js";

// =============================================================================
// TYPES
// =============================================================================

export type SkipReason = "disabled" | "no_eligible_license" | "license_filter";

export type SkippedSubject = {
  subject: Subject;
  reason: SkipReason;
};

export type EligibilityResult = {
  eligible: EligibleSubject[];
  skipped: SkippedSubject[];
};

export type EligibilityOptions = {
  table: LicenseTable;
  /** Glob matched case-insensitively against SKU id and display name. */
  licenseFilter?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function selectEligibleSubjects(
  subjects: readonly Subject[],
  options: EligibilityOptions,
): EligibilityResult {
  const eligible: EligibleSubject[] = [];
  const skipped: SkippedSubject[] = [];

  for (const subject of subjects) {
    if (!subject.enabled) {
      skipped.push({ subject, reason: "disabled" });
      continue;
    }

    const eligibleSkus = findEligibleSkus(subject.skus, options.table);
    if (eligibleSkus.length === 0) {
      skipped.push({ subject, reason: "no_eligible_license" });
      continue;
    }

    const matchingSkus = options.licenseFilter
      ? eligibleSkus.filter((sku) => matchesLicenseFilter(sku, options))
      : eligibleSkus;
    if (matchingSkus.length === 0) {
      skipped.push({ subject, reason: "license_filter" });
      continue;
    }

    eligible.push({ ...subject, skus: [...subject.skus], eligibleSkus: matchingSkus });
  }

  return { eligible, skipped };
}

export function matchesLicenseFilter(sku: string, options: EligibilityOptions): boolean {
  const pattern = options.licenseFilter;
  if (!pattern) return true;

  const displayName = options.table.get(sku)?.displayName;
  return (
    minimatch(sku, pattern, { nocase: true }) ||
    (displayName !== undefined && minimatch(displayName, pattern, { nocase: true }))
  );
}

/** SKUs the tenant holds that the eligibility table does not mention. */
export function findUnknownSkus(catalog: Record<string, string>, table: LicenseTable): string[] {
  return Object.values(catalog)
    .filter((skuName) => !table.has(skuName))
    .sort();
}
