/**
 * PowerShell status adapter.
 * Purpose: read and set mailbox litigation hold through Exchange Online cmdlets run in `pwsh`.
 * Assumptions: the connect command (when given) authenticates the session non-interactively.
 * Usage: const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 60000 });
 */

import { execa } from "execa";
import { z } from "zod";

import type { PreconditionCheck, StatusService } from "../app/sweep/ports.js";
import { PreconditionError, StatusServiceError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { StatusRecord } from "../core/model.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number },
) => Promise<{ stdout: string }>;

export type PwshStatusServiceOptions = {
  pwshPath: string;
  timeoutMs: number;
  connectCommand?: string;
  runCommand?: CommandRunner;
};

const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, options);
  return { stdout: result.stdout };
};

const MailboxSchema = z.object({
  UserPrincipalName: z.string().min(1),
  LitigationHoldEnabled: z.boolean(),
  LitigationHoldDate: z.string().nullable().optional(),
  LitigationHoldOwner: z.string().nullable().optional(),
});

type Mailbox = z.infer<typeof MailboxSchema>;

const MAILBOX_SELECT = [
  "UserPrincipalName",
  "LitigationHoldEnabled",
  "@{n='LitigationHoldDate';e={ if ($_.LitigationHoldDate) { $_.LitigationHoldDate.ToUniversalTime().ToString('o') } }}",
  "LitigationHoldOwner",
].join(",");

const NOT_FOUND_PATTERN = /couldn't be found|ManagementObjectNotFoundException/i;

// =============================================================================
// ADAPTER
// =============================================================================

export class PwshStatusService implements StatusService {
  private readonly runCommand: CommandRunner;

  constructor(private readonly options: PwshStatusServiceOptions) {
    this.runCommand = options.runCommand ?? execaRunner;
  }

  async getStatuses(ids: readonly string[]): Promise<Map<string, StatusRecord>> {
    const script = [
      `$ids = ${quotePs(JSON.stringify(ids))} | ConvertFrom-Json`,
      "$ids | ForEach-Object { Get-Mailbox -Identity $_ -ErrorAction SilentlyContinue }" +
        ` | Where-Object { $_ } | Select-Object ${MAILBOX_SELECT} | ConvertTo-Json -Depth 3 -Compress`,
    ];
    const mailboxes = parseMailboxes(await this.runScript(script));

    const wanted = new Map(ids.map((id) => [id.toLowerCase(), id]));
    const records = new Map<string, StatusRecord>();
    for (const mailbox of mailboxes) {
      const id = wanted.get(mailbox.UserPrincipalName.toLowerCase());
      if (id) records.set(id, toStatusRecord(mailbox));
    }
    return records;
  }

  async getStatus(id: string): Promise<StatusRecord | null> {
    const script = [
      `Get-Mailbox -Identity ${quotePs(id)} -ErrorAction Stop` +
        ` | Select-Object ${MAILBOX_SELECT} | ConvertTo-Json -Depth 3 -Compress`,
    ];

    let stdout: string;
    try {
      stdout = await this.runScript(script);
    } catch (error) {
      if (NOT_FOUND_PATTERN.test(formatErrorMessage(error))) return null;
      throw error;
    }

    const [mailbox] = parseMailboxes(stdout);
    return mailbox ? toStatusRecord(mailbox) : null;
  }

  async setCompliance(id: string, enabled: true): Promise<void> {
    await this.runScript([
      `Set-Mailbox -Identity ${quotePs(id)} -LitigationHoldEnabled $${enabled} -ErrorAction Stop`,
    ]);
  }

  preconditionCheck(): PreconditionCheck {
    return {
      name: "status-service",
      verify: async () => {
        try {
          await this.runScript(["Get-Command Get-Mailbox -ErrorAction Stop | Out-Null"]);
        } catch (error) {
          throw new PreconditionError(
            `Exchange cmdlets are unavailable via ${this.options.pwshPath}: ${formatErrorMessage(error)}`,
            "status-service",
            error,
          );
        }
      },
    };
  }

  // ---------------------------------------------------------------------------

  private async runScript(lines: string[]): Promise<string> {
    const script = [
      "$ErrorActionPreference = 'Stop'",
      ...(this.options.connectCommand ? [this.options.connectCommand] : []),
      ...lines,
    ].join("\n");

    try {
      const result = await this.runCommand(
        this.options.pwshPath,
        ["-NoLogo", "-NoProfile", "-NonInteractive", "-Command", script],
        { timeout: this.options.timeoutMs },
      );
      return result.stdout;
    } catch (error) {
      throw new StatusServiceError(describeExecaFailure(error, this.options.timeoutMs), error);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function quotePs(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function parseMailboxes(stdout: string): Mailbox[] {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) return [];

  let doc: unknown;
  try {
    doc = JSON.parse(trimmed);
  } catch (error) {
    throw new StatusServiceError(
      `Mailbox query returned non-JSON output: ${trimmed.slice(0, 200)}`,
      error,
    );
  }

  const parsed = z.union([MailboxSchema, z.array(MailboxSchema)]).safeParse(doc);
  if (!parsed.success) {
    throw new StatusServiceError("Mailbox query returned an unexpected shape.", parsed.error);
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}

function toStatusRecord(mailbox: Mailbox): StatusRecord {
  const record: StatusRecord = {
    complianceEnabled: mailbox.LitigationHoldEnabled,
    hasTargetResource: true,
  };
  if (mailbox.LitigationHoldDate) record.enabledDate = mailbox.LitigationHoldDate;
  if (mailbox.LitigationHoldOwner) record.owner = mailbox.LitigationHoldOwner;
  return record;
}

function describeExecaFailure(error: unknown, timeoutMs: number): string {
  if (error && typeof error === "object") {
    if ("timedOut" in error && error.timedOut === true) {
      return `PowerShell call timed out after ${timeoutMs}ms`;
    }
    if ("stderr" in error && typeof error.stderr === "string" && error.stderr.trim().length > 0) {
      return error.stderr.trim();
    }
  }
  return formatErrorMessage(error);
}
