import { Command, Option } from "commander";

import { LOG_LEVELS } from "../core/config.js";

import { adviseCommand } from "./advise.js";
import { licensesCommand } from "./licenses.js";
import { runCommand } from "./run.js";
import { parseNonNegativeInt, parsePositiveInt } from "./settings.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("holdsweep")
    .description("Reconcile and enable mailbox litigation hold across a directory")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("run")
    .description("Scan eligible accounts and enable litigation hold where it is missing")
    .option("--config <path>", "Sweep config file (default: ./holdsweep.yaml when present)")
    .option("--preview", "Report intended changes without calling Set-Mailbox")
    .option("--batch-size <n>", "Status query batch size (overrides advice)", parsePositiveInt)
    .option("--concurrency <n>", "Max simultaneous mutations (overrides advice)", parsePositiveInt)
    .addOption(
      new Option("--log-level <level>", "Console verbosity").choices([...LOG_LEVELS]),
    )
    .option("--filter <prefix>", "Only accounts whose principal name starts with <prefix>")
    .option("--license-filter <pattern>", "Only SKUs matching a glob (SKU id or display name)")
    .option("--continue-on-errors", "Never halt on the error threshold")
    .option("--max-errors <n>", "Halt once errors exceed <n>", parseNonNegativeInt)
    .option("--license-table <path>", "License eligibility table (YAML or JSON)")
    .option("--output-dir <dir>", "Directory for reports and run logs")
    .option("--memory-mb <n>", "Available memory hint for batch sizing", parsePositiveInt)
    .option("--bandwidth-mbps <n>", "Bandwidth hint for throttling", parsePositiveInt)
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .option("-y, --yes", "Skip the confirmation prompt", false)
    .action(async (opts) => {
      await runCommand({
        config: opts.config,
        preview: opts.preview,
        batchSize: opts.batchSize,
        concurrency: opts.concurrency,
        logLevel: opts.logLevel,
        filter: opts.filter,
        licenseFilter: opts.licenseFilter,
        continueOnErrors: opts.continueOnErrors,
        maxErrors: opts.maxErrors,
        licenseTable: opts.licenseTable,
        outputDir: opts.outputDir,
        memoryMb: opts.memoryMb,
        bandwidthMbps: opts.bandwidthMbps,
        runId: opts.runId,
        yes: opts.yes,
      });
    });

  program
    .command("advise")
    .description("Print recommended batch/concurrency settings for an environment size")
    .requiredOption("--total <n>", "Number of accounts in scope", parseNonNegativeInt)
    .option("--memory-mb <n>", "Available memory hint", parsePositiveInt)
    .option("--bandwidth-mbps <n>", "Bandwidth hint", parsePositiveInt)
    .option("--json", "Print advice as JSON", false)
    .action((opts) => {
      adviseCommand({
        total: opts.total,
        memoryMb: opts.memoryMb,
        bandwidthMbps: opts.bandwidthMbps,
        json: opts.json,
      });
    });

  program
    .command("licenses")
    .description("List the license SKUs that qualify an account for litigation hold")
    .option("--license-table <path>", "License eligibility table (YAML or JSON)")
    .option("--all", "Include SKUs that do not support litigation hold", false)
    .action((opts) => {
      licensesCommand({ licenseTable: opts.licenseTable, all: opts.all });
    });

  return program;
}
