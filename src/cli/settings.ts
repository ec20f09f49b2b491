import { InvalidArgumentError } from "commander";

import type {
  DirectoryConfig,
  LogLevel,
  StatusServiceConfig,
  SweepConfig,
} from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunFlags = {
  config?: string;
  preview?: boolean;
  batchSize?: number;
  concurrency?: number;
  logLevel?: LogLevel;
  filter?: string;
  licenseFilter?: string;
  continueOnErrors?: boolean;
  maxErrors?: number;
  licenseTable?: string;
  outputDir?: string;
  memoryMb?: number;
  bandwidthMbps?: number;
  yes?: boolean;
  runId?: string;
};

export type RunSettings = {
  preview: boolean;
  batchSize?: number;
  concurrency?: number;
  maxErrors: number;
  continueOnErrors: boolean;
  filter?: string;
  licenseFilter?: string;
  licenseTable?: string;
  outputDir: string;
  logLevel: LogLevel;
  hints: { memoryMb?: number; bandwidthMbps?: number };
  directory: DirectoryConfig;
  statusService: StatusServiceConfig;
};

// =============================================================================
// MERGE
// =============================================================================

/** Flags win over the config file, which wins over schema defaults. */
export function resolveRunSettings(config: SweepConfig, flags: RunFlags): RunSettings {
  return {
    preview: flags.preview ?? config.preview,
    batchSize: flags.batchSize ?? config.batch_size,
    concurrency: flags.concurrency ?? config.concurrency,
    maxErrors: flags.maxErrors ?? config.max_errors,
    continueOnErrors: flags.continueOnErrors ?? config.continue_on_errors,
    filter: flags.filter ?? config.filter,
    licenseFilter: flags.licenseFilter ?? config.license_filter,
    licenseTable: flags.licenseTable ?? config.license_table,
    outputDir: flags.outputDir ?? config.output_dir,
    logLevel: flags.logLevel ?? config.log_level,
    hints: {
      memoryMb: flags.memoryMb ?? config.hints.memory_mb,
      bandwidthMbps: flags.bandwidthMbps ?? config.hints.bandwidth_mbps,
    },
    directory: config.directory,
    statusService: config.status_service,
  };
}

// =============================================================================
// FLAG PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}
