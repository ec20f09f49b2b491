import path from "node:path";

import { GraphDirectorySource } from "../adapters/graph-directory.js";
import { FileReportSink } from "../adapters/file-report-sink.js";
import { PwshStatusService } from "../adapters/pwsh-status-service.js";
import type { SweepPorts } from "../app/sweep/ports.js";
import {
  SweepEngine,
  type MutationPlan,
  type SweepRunResult,
} from "../app/sweep/sweep-engine.js";
import { loadSweepConfig } from "../core/config-loader.js";
import { loadLicenseTable } from "../core/license-table.js";
import { JsonlLogger, logSweepEvent } from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";

import { ConsoleReporter } from "./console-reporter.js";
import { toUserFacingError } from "./error-format.js";
import { createMutationConfirmer } from "./prompt.js";
import { resolveRunSettings, type RunFlags, type RunSettings } from "./settings.js";

// =============================================================================
// TYPES
// =============================================================================

export type PortsContext = {
  runId: string;
  reportDir: string;
  env: NodeJS.ProcessEnv;
};

export type SweepPortsFactory = (settings: RunSettings, context: PortsContext) => SweepPorts;

export type RunCommandDeps = {
  createPorts?: SweepPortsFactory;
  confirm?: (plan: MutationPlan) => Promise<boolean>;
  reporter?: ConsoleReporter;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// PORTS
// =============================================================================

export function createDefaultPorts(settings: RunSettings, context: PortsContext): SweepPorts {
  const directory = new GraphDirectorySource({
    baseUrl: settings.directory.graph_base_url,
    token: context.env[settings.directory.token_env],
    pageSize: settings.directory.page_size,
    timeoutMs: settings.directory.timeout_ms,
  });
  const statusService = new PwshStatusService({
    pwshPath: context.env.HOLDSWEEP_PWSH ?? settings.statusService.pwsh_path,
    timeoutMs: resolveTimeoutOverride(
      context.env.HOLDSWEEP_STATUS_TIMEOUT_MS,
      settings.statusService.timeout_ms,
    ),
    connectCommand: settings.statusService.connect_command,
  });

  return {
    directory,
    statusService,
    reportSink: new FileReportSink(context.reportDir, context.runId),
    preconditions: [directory.preconditionCheck(), statusService.preconditionCheck()],
  };
}

export function resolveTimeoutOverride(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// =============================================================================
// COMMAND
// =============================================================================

/**
 * Runs a sweep. Resolves with the result when the run completes or is cancelled at the
 * confirmation prompt; throws a UserFacingError after printing the summary when it halts.
 */
export async function runCommand(
  flags: RunFlags,
  deps: RunCommandDeps = {},
): Promise<SweepRunResult> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;

  const { config, configPath } = loadSweepConfig({ explicitPath: flags.config, cwd, env });
  const settings = resolveRunSettings(config, flags);
  const reporter = deps.reporter ?? new ConsoleReporter(settings.logLevel);
  if (configPath) reporter.debug(`Using config ${configPath}`);

  const runId = flags.runId ?? defaultRunId();
  const reportDir = path.resolve(cwd, settings.outputDir, runId);
  const runLog = new JsonlLogger(path.join(reportDir, "sweep.jsonl"), { runId });

  try {
    const licenses = loadLicenseTable({ tablePath: settings.licenseTable, cwd });
    for (const warning of licenses.warnings) {
      reporter.warn(warning);
      logSweepEvent(runLog, "licenses.table_fallback", { message: warning });
    }
    reporter.debug(`License table: ${licenses.path} (${licenses.table.size} SKUs)`);

    const ports = (deps.createPorts ?? createDefaultPorts)(settings, { runId, reportDir, env });
    const engine = new SweepEngine(ports, runLog);
    const confirm = flags.yes ? undefined : (deps.confirm ?? createMutationConfirmer());

    reporter.info(
      `Starting ${settings.preview ? "preview" : "live"} sweep ${runId}` +
        (settings.filter ? ` (identity filter: ${settings.filter})` : ""),
    );

    let result: SweepRunResult;
    try {
      result = await engine.run({
        runId,
        preview: settings.preview,
        licenseTable: licenses.table,
        identityFilter: settings.filter,
        licenseFilter: settings.licenseFilter,
        batchSize: settings.batchSize,
        concurrencyLimit: settings.concurrency,
        maxErrors: settings.maxErrors,
        continueOnErrors: settings.continueOnErrors,
        hints: settings.hints,
        onProgress: (event) => reporter.progress(event),
        onAdvice: (advice) => reporter.advice(advice),
        confirmMutation: confirm,
      });
    } catch (error) {
      throw toUserFacingError(error);
    }

    reporter.summary(result.report.summary);
    if (result.reportPaths) {
      reporter.info(`Detail report: ${result.reportPaths.detail}`);
      reporter.info(`Summary: ${result.reportPaths.summary}`);
    }
    if (result.thresholdSuppressed) {
      reporter.warn(
        `Errors exceeded --max-errors (${settings.maxErrors}) but --continue-on-errors kept the run going.`,
      );
    }

    if (result.halt) {
      throw toUserFacingError(result.halt);
    }
    if (result.status === "cancelled") {
      reporter.info("Cancelled before any changes were made.");
    }

    return result;
  } finally {
    runLog.close();
  }
}
