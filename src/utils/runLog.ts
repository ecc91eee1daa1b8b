/**
 * Append-only run log: one human-readable line per job run in
 * logs/runs.log, optionally mirrored as a row into Supabase `report_runs`.
 *
 * record() never throws; a failed write is logged and the job carries on.
 */

import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import type { SupabaseClient } from "@supabase/supabase-js";
import { describeError } from "../errors.ts";
import type { NotificationResult } from "../notify/types.ts";
import type { ReportType } from "../reports/types.ts";

export type TriggerSource = "schedule" | "manual" | "startup";

export interface RunOutcome {
  kind: ReportType;
  trigger: TriggerSource;
  startedAt: Date;
  finishedAt: Date;
  status: "succeeded" | "failed";
  rangeLabel: string;
  /** Parsed record count; null when the run failed before parsing */
  records: number | null;
  deliveries: NotificationResult[];
  error: string | null;
  traceId: string;
}

export interface RunRow {
  kind: string;
  trigger: string;
  started_at: string;
  finished_at: string;
  status: string;
  range_label: string;
  records: number | null;
  deliveries: { channel: string; status: string; error: string | null }[];
  error: string | null;
  trace_id: string;
}

export type RunMirror = (row: RunRow) => Promise<void>;

export function formatRunLine(outcome: RunOutcome): string {
  const seconds = ((outcome.finishedAt.getTime() - outcome.startedAt.getTime()) / 1000).toFixed(1);
  const parts = [
    outcome.startedAt.toISOString(),
    outcome.kind,
    outcome.trigger,
    outcome.status.toUpperCase(),
    `${seconds}s`,
    `range="${outcome.rangeLabel}"`,
  ];
  if (outcome.records !== null) parts.push(`records=${outcome.records}`);
  for (const d of outcome.deliveries) parts.push(`${d.channel}=${d.status}`);
  if (outcome.error) parts.push(`error="${outcome.error.replace(/\s+/g, " ")}"`);
  return parts.join(" ");
}

export function toRunRow(outcome: RunOutcome): RunRow {
  return {
    kind: outcome.kind,
    trigger: outcome.trigger,
    started_at: outcome.startedAt.toISOString(),
    finished_at: outcome.finishedAt.toISOString(),
    status: outcome.status,
    range_label: outcome.rangeLabel,
    records: outcome.records,
    deliveries: outcome.deliveries.map((d) => ({ channel: d.channel, status: d.status, error: d.error ?? null })),
    error: outcome.error,
    trace_id: outcome.traceId,
  };
}

export function supabaseMirror(client: SupabaseClient): RunMirror {
  return async (row) => {
    const { error } = await client.from("report_runs").insert(row);
    if (error) throw new Error(error.message);
  };
}

export class RunLog {
  constructor(
    private readonly file: string,
    private readonly mirror: RunMirror | null = null
  ) {}

  async record(outcome: RunOutcome): Promise<void> {
    const line = formatRunLine(outcome);
    try {
      await mkdir(dirname(this.file), { recursive: true });
      await appendFile(this.file, line + "\n", "utf-8");
    } catch (error) {
      console.error(`[runlog] Could not append to ${this.file}: ${describeError(error)}`);
    }

    if (!this.mirror) return;
    try {
      await this.mirror(toRunRow(outcome));
    } catch (error) {
      console.error(`[runlog] Supabase insert failed: ${describeError(error)}`);
    }
  }
}
