/**
 * License eligibility table.
 * Purpose: load the SKU -> {displayName, litigationHoldSupported} table, grouped by category.
 * Assumptions: a missing or malformed table is recoverable; the bundled default replaces it.
 * Usage: const { table, warnings } = loadLicenseTable({ tablePath: "licenses.yaml" });
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import yaml from "js-yaml";

import { LicenseTableDocumentSchema, type LicenseTableDocument } from "./config.js";
import { formatIssues } from "./config-loader.js";
import { ConfigError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import type { EligibleLicense, LicenseTable } from "./model.js";

// =============================================================================
// TYPES
// =============================================================================

export type LicenseTableSource = "file" | "default";

export type LoadedLicenseTable = {
  table: LicenseTable;
  source: LicenseTableSource;
  path: string;
  warnings: string[];
};

const DEFAULT_TABLE_FILENAME = "default-licenses.json";

// =============================================================================
// PARSING
// =============================================================================

export function buildLicenseTable(doc: LicenseTableDocument): LicenseTable {
  const table = new Map<string, EligibleLicense>();

  for (const [category, entries] of Object.entries(doc.categories)) {
    for (const [skuId, entry] of Object.entries(entries)) {
      const existing = table.get(skuId);
      if (existing) {
        throw new ConfigError(
          `SKU ${skuId} is listed in both "${existing.category}" and "${category}".`,
        );
      }
      table.set(skuId, {
        skuId,
        displayName: entry.display_name,
        category,
        litigationHoldSupported: entry.litigation_hold_supported,
      });
    }
  }

  return table;
}

/** Parses YAML or JSON (JSON is valid YAML) into a table; throws ConfigError on any mismatch. */
export function parseLicenseTableText(raw: string, source: string): LicenseTable {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse license table ${source}: ${formatErrorMessage(err)}`, err);
  }

  const parsed = LicenseTableDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(
      `License table ${source} is invalid:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  return buildLicenseTable(parsed.data);
}

// =============================================================================
// LOADING
// =============================================================================

export function resolveDefaultLicenseTablePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  // src/core -> <root>/data ; dist/src/core -> <root>/data
  const candidates = [
    path.resolve(here, "../../data", DEFAULT_TABLE_FILENAME),
    path.resolve(here, "../../../data", DEFAULT_TABLE_FILENAME),
  ];

  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Bundled license table not found (looked in ${candidates.join(", ")})`);
  }
  return found;
}

export function loadDefaultLicenseTable(): LoadedLicenseTable {
  const tablePath = resolveDefaultLicenseTablePath();
  const table = parseLicenseTableText(fs.readFileSync(tablePath, "utf8"), tablePath);
  return { table, source: "default", path: tablePath, warnings: [] };
}

export function loadLicenseTable(options: { tablePath?: string; cwd?: string } = {}): LoadedLicenseTable {
  if (!options.tablePath) {
    return loadDefaultLicenseTable();
  }

  const absolutePath = path.resolve(options.cwd ?? process.cwd(), options.tablePath);

  try {
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`License table not found at ${absolutePath}.`);
    }
    const table = parseLicenseTableText(fs.readFileSync(absolutePath, "utf8"), absolutePath);
    return { table, source: "file", path: absolutePath, warnings: [] };
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }

    const fallback = loadDefaultLicenseTable();
    return {
      ...fallback,
      warnings: [`${error.message} Using the built-in license table instead.`],
    };
  }
}

// =============================================================================
// LOOKUPS
// =============================================================================

export function eligibleLicenses(table: LicenseTable): EligibleLicense[] {
  return [...table.values()].filter((license) => license.litigationHoldSupported);
}

export function findEligibleSkus(skus: readonly string[], table: LicenseTable): string[] {
  return skus.filter((sku) => table.get(sku)?.litigationHoldSupported === true);
}
