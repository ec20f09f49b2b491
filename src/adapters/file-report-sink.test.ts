import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import type { ReportRow, RunSummary } from "../app/sweep/report.js";

import { escapeCsvField, FileReportSink, renderReportCsv } from "./file-report-sink.js";

const TS = "2026-01-15T09:30:00.000Z";

function row(overrides: Partial<ReportRow>): ReportRow {
  return {
    identity: "a@contoso.test",
    label: "Alice",
    status: "hold_disabled",
    holdOwner: "",
    holdEnabledDate: "",
    licenses: ["SPE_E3"],
    action: "enabled",
    error: "",
    timestamp: TS,
    note: "",
    ...overrides,
  };
}

describe("escapeCsvField", () => {
  it("quotes only when needed", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("Doe, Jane")).toBe('"Doe, Jane"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("renderReportCsv", () => {
  it("writes a header and one line per row", () => {
    const csv = renderReportCsv([
      row({ label: 'Doe, "AJ"', licenses: ["SPE_E3", "SPE_E5"] }),
      row({ identity: "b@contoso.test", label: "Bob", action: "failed", error: "Access denied" }),
    ]);

    expect(csv).toBe(
      [
        "Identity,Label,Status,HoldOwner,HoldEnabledDate,Licenses,Action,Error,Timestamp,Note",
        `a@contoso.test,"Doe, ""AJ""",hold_disabled,,,SPE_E3;SPE_E5,enabled,,${TS},`,
        `b@contoso.test,Bob,hold_disabled,,,SPE_E3,failed,Access denied,${TS},`,
        "",
      ].join("\n"),
    );
  });
});

describe("FileReportSink", () => {
  it("writes the detail CSV and summary JSON into the run directory", async () => {
    const dir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "sweep-report-")), "run-7");
    const sink = new FileReportSink(dir, "run-7");
    const summary: RunSummary = {
      runId: "run-7",
      preview: true,
      startedAt: TS,
      finishedAt: TS,
      elapsedMs: 0,
      discovered: 1,
      skipped: 0,
      totalEligible: 1,
      processed: 1,
      alreadyCompliant: 0,
      newlyEnabled: 0,
      wouldEnable: 1,
      failed: 0,
      noTargetResource: 0,
      noActionRequired: 0,
      totalErrors: 0,
      halted: false,
    };

    const detailPath = await sink.writeDetail([row({ action: "preview_would_enable" })]);
    const summaryPath = await sink.writeSummary(summary);

    expect(detailPath).toBe(path.join(dir, "holdsweep-run-7.csv"));
    expect(summaryPath).toBe(path.join(dir, "holdsweep-run-7.summary.json"));
    expect(fs.readFileSync(detailPath, "utf8").split("\n")[1]).toBe(
      `a@contoso.test,Alice,hold_disabled,,,SPE_E3,preview_would_enable,,${TS},`,
    );
    const written: unknown = JSON.parse(fs.readFileSync(summaryPath, "utf8"));
    expect(written).toEqual(summary);
  });
});
