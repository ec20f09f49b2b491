import { execa } from "execa";
import { describe, expect, it, vi } from "vitest";

import { PreconditionError, StatusServiceError } from "../core/errors.js";

import {
  parseMailboxes,
  PwshStatusService,
  quotePs,
  type CommandRunner,
} from "./pwsh-status-service.js";

vi.mock("execa", () => ({ execa: vi.fn() }));

// =============================================================================
// HELPERS
// =============================================================================

function runnerReturning(stdout: string) {
  return vi.fn<CommandRunner>(async () => ({ stdout }));
}

function runnerRejecting(error: unknown) {
  return vi.fn<CommandRunner>(async () => {
    throw error;
  });
}

function commandFailure(stderr: string): Error {
  return Object.assign(new Error("Command failed with exit code 1"), { stderr });
}

function scriptOf(runner: ReturnType<typeof runnerReturning>): string {
  const args = runner.mock.calls[0]?.[1] ?? [];
  return args[args.length - 1] ?? "";
}

// =============================================================================
// TESTS
// =============================================================================

describe("PwshStatusService", () => {
  it("maps a batch query back to the requested identities", async () => {
    const runCommand = runnerReturning(
      JSON.stringify([
        {
          UserPrincipalName: "alice@contoso.test",
          LitigationHoldEnabled: true,
          LitigationHoldDate: "2025-06-01T00:00:00.0000000Z",
          LitigationHoldOwner: "legal@contoso.test",
        },
        {
          UserPrincipalName: "bob@contoso.test",
          LitigationHoldEnabled: false,
          LitigationHoldDate: null,
          LitigationHoldOwner: null,
        },
      ]),
    );
    const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 5000, runCommand });

    const records = await service.getStatuses([
      "Alice@Contoso.test",
      "bob@contoso.test",
      "carol@contoso.test",
    ]);

    expect([...records.entries()]).toEqual([
      [
        "Alice@Contoso.test",
        {
          complianceEnabled: true,
          hasTargetResource: true,
          enabledDate: "2025-06-01T00:00:00.0000000Z",
          owner: "legal@contoso.test",
        },
      ],
      ["bob@contoso.test", { complianceEnabled: false, hasTargetResource: true }],
    ]);
    expect(runCommand).toHaveBeenCalledWith(
      "pwsh",
      ["-NoLogo", "-NoProfile", "-NonInteractive", "-Command", expect.any(String)],
      { timeout: 5000 },
    );
    expect(scriptOf(runCommand)).toContain(
      `$ids = '["Alice@Contoso.test","bob@contoso.test","carol@contoso.test"]' | ConvertFrom-Json`,
    );
  });

  it("runs the connect command before the query", async () => {
    const runCommand = runnerReturning("");
    const service = new PwshStatusService({
      pwshPath: "pwsh",
      timeoutMs: 5000,
      connectCommand: "Connect-ExchangeOnline -AppId test-app -Organization contoso.test",
      runCommand,
    });

    await service.getStatuses(["a@contoso.test"]);

    expect(scriptOf(runCommand).split("\n").slice(0, 2)).toEqual([
      "$ErrorActionPreference = 'Stop'",
      "Connect-ExchangeOnline -AppId test-app -Organization contoso.test",
    ]);
  });

  it("returns null for a mailbox that does not exist", async () => {
    const runCommand = runnerRejecting(
      commandFailure("Get-Mailbox: The operation couldn't be performed because object 'x' couldn't be found."),
    );
    const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 5000, runCommand });

    await expect(service.getStatus("x@contoso.test")).resolves.toBeNull();
  });

  it("surfaces other lookup failures with their stderr", async () => {
    const runCommand = runnerRejecting(commandFailure("  Access denied.  \n"));
    const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 5000, runCommand });

    const lookup = service.getStatus("x@contoso.test");

    await expect(lookup).rejects.toBeInstanceOf(StatusServiceError);
    await expect(lookup).rejects.toThrow("Access denied.");
  });

  it("reports timeouts", async () => {
    const runCommand = runnerRejecting(Object.assign(new Error("timed out"), { timedOut: true }));
    const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 750, runCommand });

    await expect(service.setCompliance("a@contoso.test", true)).rejects.toThrow(
      "PowerShell call timed out after 750ms",
    );
  });

  it("enables litigation hold with a quoted identity", async () => {
    const runCommand = runnerReturning("");
    const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 5000, runCommand });

    await service.setCompliance("o'neil@contoso.test", true);

    expect(scriptOf(runCommand).split("\n").at(-1)).toBe(
      "Set-Mailbox -Identity 'o''neil@contoso.test' -LitigationHoldEnabled $true -ErrorAction Stop",
    );
  });

  it("fails the precondition when the cmdlets are unavailable", async () => {
    const runCommand = runnerRejecting(commandFailure("Get-Command: The term 'Get-Mailbox' is not recognized."));
    const service = new PwshStatusService({ pwshPath: "pwsh", timeoutMs: 5000, runCommand });

    const verify = service.preconditionCheck().verify();

    await expect(verify).rejects.toBeInstanceOf(PreconditionError);
    await expect(verify).rejects.toThrow(
      "Exchange cmdlets are unavailable via pwsh: Get-Command: The term 'Get-Mailbox' is not recognized.",
    );
  });

  it("runs pwsh through execa by default", async () => {
    vi.mocked(execa).mockRejectedValueOnce(commandFailure("pwsh: command not found"));
    const service = new PwshStatusService({ pwshPath: "/opt/pwsh", timeoutMs: 1000 });

    await expect(service.setCompliance("a@contoso.test", true)).rejects.toThrow(
      "pwsh: command not found",
    );
    expect(execa).toHaveBeenCalledWith(
      "/opt/pwsh",
      expect.arrayContaining(["-NonInteractive", "-Command"]),
      { timeout: 1000 },
    );
  });
});

describe("parseMailboxes", () => {
  it("accepts empty output, a single object or an array", () => {
    const mailbox = { UserPrincipalName: "a@contoso.test", LitigationHoldEnabled: false };

    expect(parseMailboxes("  \n")).toEqual([]);
    expect(parseMailboxes(JSON.stringify(mailbox))).toEqual([mailbox]);
    expect(parseMailboxes(JSON.stringify([mailbox, mailbox]))).toHaveLength(2);
  });

  it("rejects output that is not mailbox JSON", () => {
    expect(() => parseMailboxes("WARNING: something")).toThrow(
      "Mailbox query returned non-JSON output: WARNING: something",
    );
    expect(() => parseMailboxes(JSON.stringify({ Name: "x" }))).toThrow(
      "Mailbox query returned an unexpected shape.",
    );
  });
});

describe("quotePs", () => {
  it("doubles single quotes", () => {
    expect(quotePs("it's")).toBe("'it''s'");
  });
});
