import { eligibleLicenses, loadLicenseTable } from "../core/license-table.js";
import type { EligibleLicense } from "../core/model.js";

import type { ConsoleLike } from "./console-reporter.js";

export type LicensesCommandOptions = {
  licenseTable?: string;
  all?: boolean;
  cwd?: string;
};

/** Prints the eligibility table grouped by category. */
export function licensesCommand(
  opts: LicensesCommandOptions,
  out: ConsoleLike = console,
): EligibleLicense[] {
  const loaded = loadLicenseTable({ tablePath: opts.licenseTable, cwd: opts.cwd });
  for (const warning of loaded.warnings) {
    out.warn(`Warning: ${warning}`);
  }

  const listed = opts.all ? [...loaded.table.values()] : eligibleLicenses(loaded.table);

  const byCategory = new Map<string, EligibleLicense[]>();
  for (const license of listed) {
    const group = byCategory.get(license.category) ?? [];
    group.push(license);
    byCategory.set(license.category, group);
  }

  out.log(`License table: ${loaded.path} (${loaded.source})`);
  for (const [category, licenses] of byCategory) {
    out.log(category);
    for (const license of licenses) {
      const marker = license.litigationHoldSupported ? "" : " (not eligible)";
      out.log(`  ${license.skuId.padEnd(32)} ${license.displayName}${marker}`);
    }
  }

  return listed;
}
