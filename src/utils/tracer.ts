/**
 * JSONL trace events, one file per UTC day under the log directory
 * (logs/YYYY-MM-DD.jsonl).
 *
 * Off until configureTracer() is called with tracing enabled; main does that
 * once settings are loaded, so OBSERVABILITY_ENABLED and LOG_DIR from .env
 * apply. Writes are queued in order and never reach the caller: a failed
 * write is logged. Files older than the retention period are removed before
 * the first write.
 */

import { randomUUID } from "crypto";
import { appendFile, mkdir, readdir, stat, unlink } from "fs/promises";
import { join } from "path";
import type { ReportType } from "../reports/types.ts";

export interface TracerOptions {
  logDir: string;
  retentionDays: number;
  enabled: boolean;
}

/** One trace line. `traceId` and `kind` tie together the events of a job run. */
export interface TraceEvent {
  event: string;
  traceId?: string;
  kind?: ReportType;
  [field: string]: unknown;
}

const DAY_MS = 86_400_000;

class JsonlTracer {
  private pending: Promise<void> = Promise.resolve();
  private prepared = false;

  constructor(private readonly options: TracerOptions) {}

  write(event: TraceEvent, at: Date): void {
    const iso = at.toISOString();
    const line = JSON.stringify({ ts: iso, ...event }) + "\n";
    const file = join(this.options.logDir, `${iso.slice(0, 10)}.jsonl`);

    this.pending = this.pending
      .then(() => this.prepare(at))
      .then(() => appendFile(file, line))
      .catch((err: unknown) => {
        console.error("[tracer] write failed:", err);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private async prepare(at: Date): Promise<void> {
    if (this.prepared) return;
    await mkdir(this.options.logDir, { recursive: true });
    this.prepared = true;
    try {
      await this.removeExpired(at.getTime() - this.options.retentionDays * DAY_MS);
    } catch (err) {
      console.error("[tracer] cleanup failed:", err);
    }
  }

  private async removeExpired(cutoffMs: number): Promise<void> {
    for (const name of await readdir(this.options.logDir)) {
      if (!name.endsWith(".jsonl")) continue;
      const path = join(this.options.logDir, name);
      if ((await stat(path)).mtimeMs < cutoffMs) await unlink(path);
    }
  }
}

let active: JsonlTracer | null = null;

/** Replace the tracer. With `enabled: false` tracing is off. */
export function configureTracer(options: TracerOptions): void {
  active = options.enabled ? new JsonlTracer(options) : null;
  if (active) console.log(`[tracer] Writing traces to ${options.logDir}`);
}

/** Queue one event. No-op while tracing is off. */
export function trace(event: TraceEvent): void {
  active?.write(event, new Date());
}

/** Resolves once every queued event has been written (or has failed). */
export function flushTraces(): Promise<void> {
  return active ? active.flush() : Promise.resolve();
}

/** Correlates the events of one job run. */
export function generateTraceId(): string {
  return randomUUID();
}
