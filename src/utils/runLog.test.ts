import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { RunLog, formatRunLine, toRunRow, type RunOutcome, type RunRow } from "./runLog.ts";

const SUCCESS: RunOutcome = {
  kind: "daily",
  trigger: "schedule",
  startedAt: new Date("2026-10-19T03:00:00.000Z"),
  finishedAt: new Date("2026-10-19T03:00:42.500Z"),
  status: "succeeded",
  rangeLabel: "20 Oct (Tuesday)",
  records: 5,
  deliveries: [
    { channel: "email", status: "sent" },
    { channel: "sms", status: "failed", error: "DeliveryError: HTTP 500" },
  ],
  error: null,
  traceId: "trace-1",
};

const FAILURE: RunOutcome = {
  ...SUCCESS,
  trigger: "manual",
  status: "failed",
  records: null,
  deliveries: [],
  error: "AuthError: signed out\nat login",
};

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "run-log-test-"));
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("formatRunLine", () => {
  test("success", () => {
    expect(formatRunLine(SUCCESS)).toBe(
      '2026-10-19T03:00:00.000Z daily schedule SUCCEEDED 42.5s range="20 Oct (Tuesday)" records=5 email=sent sms=failed'
    );
  });

  test("failure keeps the error on one line", () => {
    expect(formatRunLine(FAILURE)).toBe(
      '2026-10-19T03:00:00.000Z daily manual FAILED 42.5s range="20 Oct (Tuesday)" error="AuthError: signed out at login"'
    );
  });
});

test("toRunRow", () => {
  expect(toRunRow(SUCCESS)).toEqual({
    kind: "daily",
    trigger: "schedule",
    started_at: "2026-10-19T03:00:00.000Z",
    finished_at: "2026-10-19T03:00:42.500Z",
    status: "succeeded",
    range_label: "20 Oct (Tuesday)",
    records: 5,
    deliveries: [
      { channel: "email", status: "sent", error: null },
      { channel: "sms", status: "failed", error: "DeliveryError: HTTP 500" },
    ],
    error: null,
    trace_id: "trace-1",
  });
});

describe("RunLog.record", () => {
  test("appends one line per run", async () => {
    const file = join(dir, "logs", "runs.log");
    const log = new RunLog(file);
    await log.record(SUCCESS);
    await log.record(FAILURE);

    const lines = readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines).toEqual([formatRunLine(SUCCESS), formatRunLine(FAILURE)]);
  });

  test("mirrors rows and survives a mirror failure", async () => {
    const rows: RunRow[] = [];
    const file = join(dir, "runs.log");
    const log = new RunLog(file, async (row) => {
      rows.push(row);
      throw new Error("relation report_runs does not exist");
    });

    await expect(log.record(SUCCESS)).resolves.toBeUndefined();
    expect(rows).toHaveLength(1);
    expect(readFileSync(file, "utf-8")).toBe(formatRunLine(SUCCESS) + "\n");
    expect(console.error).toHaveBeenCalledWith("[runlog] Supabase insert failed: relation report_runs does not exist");
  });
});
