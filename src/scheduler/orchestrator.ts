/**
 * Scheduler/Orchestrator: the relay's control loop.
 *
 * Cron ticks, the heartbeat timer, console commands and startup flags all
 * end up in trigger()/triggerHeartbeat(), which submit work to the single
 * session lane. Per job kind:
 *
 *   idle ──trigger──▶ queued ──lane──▶ running ──▶ succeeded | failed ──▶ idle
 *
 * A trigger for a kind that is already queued or running, or that was
 * already triggered in the same calendar minute, is dropped and logged.
 * A failing run never touches the cron registration.
 */

import cron from "node-cron";
import { AuthError, DeliveryError, FormatError, describeError } from "../errors.ts";
import type { NotificationDispatcher } from "../notify/dispatcher.ts";
import type { NotificationResult } from "../notify/types.ts";
import type { SessionLane } from "../queue/sessionLane.ts";
import type { LaneStats } from "../queue/types.ts";
import { buildReportRequest } from "../reports/dateRange.ts";
import type { ReportFetcher } from "../reports/reportFetcher.ts";
import type { RawReport, ReportRecord, ReportRequest, ReportType } from "../reports/types.ts";
import type { HeartbeatResult, SessionManager, SessionSnapshot } from "../session/sessionManager.ts";
import type { RunLog, RunOutcome, TriggerSource } from "../utils/runLog.ts";
import { generateTraceId, trace } from "../utils/tracer.ts";
import type { JobSchedule } from "./schedule.ts";

export type JobKind = ReportType;

export const JOB_KINDS: readonly JobKind[] = ["daily", "weekly"];

export interface Job {
  kind: JobKind;
  schedule: string;
  state: "idle" | "running";
  /** Waiting on the lane behind other work */
  queued: boolean;
  lastTriggeredAt: Date | null;
  lastRunAt: Date | null;
  lastStatus: "succeeded" | "failed" | null;
  lastTrigger: TriggerSource | null;
  lastError: string | null;
}

export interface CronTask {
  stop(): void;
}

export type CronScheduleFn = (expression: string, onTick: () => void, timezone: string) => CronTask;

export const nodeCronSchedule: CronScheduleFn = (expression, onTick, timezone) =>
  cron.schedule(expression, onTick, { timezone });

export interface OrchestratorOptions {
  lane: SessionLane;
  session: SessionManager;
  fetcher: Pick<ReportFetcher, "fetch">;
  parse: (raw: RawReport, reportType: ReportType) => ReportRecord[];
  dispatcher: Pick<NotificationDispatcher, "dispatch" | "escalate">;
  runLog: Pick<RunLog, "record">;
  schedules: Record<JobKind, JobSchedule>;
  timezone: string;
  heartbeatIntervalMinutes: number;
  /** Closes the browser on stop() */
  closePortal?: () => Promise<void>;
  scheduleCron?: CronScheduleFn;
  now?: () => Date;
}

export interface OrchestratorStatus {
  jobs: Job[];
  session: SessionSnapshot;
  lane: LaneStats;
  coalesced: number;
  heartbeatQueued: boolean;
}

type Stage = "request" | "session" | "fetch" | "parse" | "dispatch";

/** Range label recorded when the run failed before its date range was known */
const UNKNOWN_RANGE = "(unknown)";

function minuteOf(date: Date): number {
  return Math.floor(date.getTime() / 60_000);
}

export class Orchestrator {
  private readonly jobs: Record<JobKind, Job>;
  private tasks: CronTask[] = [];
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private heartbeatQueued = false;
  private coalesced = 0;
  private stopped = false;

  constructor(private readonly options: OrchestratorOptions) {
    this.jobs = {
      daily: this.newJob("daily"),
      weekly: this.newJob("weekly"),
    };
  }

  private newJob(kind: JobKind): Job {
    return {
      kind,
      schedule: this.options.schedules[kind].description,
      state: "idle",
      queued: false,
      lastTriggeredAt: null,
      lastRunAt: null,
      lastStatus: null,
      lastTrigger: null,
      lastError: null,
    };
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /** Register the cron jobs and the heartbeat timer. */
  start(): void {
    const scheduleCron = this.options.scheduleCron ?? nodeCronSchedule;

    for (const kind of JOB_KINDS) {
      const { cron: expression, description } = this.options.schedules[kind];
      this.tasks.push(
        scheduleCron(
          expression,
          () => {
            void this.trigger(kind, "schedule");
          },
          this.options.timezone
        )
      );
      console.log(`[scheduler] ${kind} report: ${description} (${expression}, ${this.options.timezone})`);
    }

    const intervalMs = this.options.heartbeatIntervalMinutes * 60_000;
    this.heartbeatTimer = setInterval(() => {
      void this.triggerHeartbeat();
    }, intervalMs);
    console.log(`[scheduler] Heartbeat every ${this.options.heartbeatIntervalMinutes} min`);
  }

  /**
   * Stop accepting triggers, unregister timers, let queued work finish (up
   * to graceMs) and close the browser.
   */
  async stop(graceMs: number = 30_000): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    for (const task of this.tasks) task.stop();
    this.tasks = [];
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    const drained = await this.options.lane.drain(graceMs);
    if (!drained) {
      console.warn(`[scheduler] Lane still busy after ${graceMs}ms; closing anyway`);
    }
    if (this.options.closePortal) {
      await this.options.closePortal().catch((error: unknown) => {
        console.error(`[scheduler] Closing the portal failed: ${describeError(error)}`);
      });
    }
    console.log("[scheduler] Stopped");
  }

  // ============================================================
  // TRIGGERS
  // ============================================================

  /**
   * Request a run of `kind`. Resolves with the run's outcome, or null when
   * the trigger was coalesced. Never rejects.
   */
  trigger(kind: JobKind, source: TriggerSource): Promise<RunOutcome | null> {
    const job = this.jobs[kind];
    const now = this.now();

    if (this.stopped) {
      console.log(`[scheduler] ${kind} trigger (${source}) ignored: shutting down`);
      return Promise.resolve(null);
    }

    let reason: string | null = null;
    if (job.state === "running") reason = "already running";
    else if (job.queued) reason = "already queued";
    else if (job.lastTriggeredAt && minuteOf(job.lastTriggeredAt) === minuteOf(now)) reason = "already ran this minute";

    if (reason) {
      this.coalesced++;
      console.log(`[scheduler] ${kind} trigger (${source}) coalesced: ${reason}`);
      trace({ event: "trigger_coalesced", kind, source, reason });
      return Promise.resolve(null);
    }

    job.queued = true;
    job.lastTriggeredAt = now;
    console.log(`[scheduler] ${kind} report triggered (${source})`);

    return this.options.lane.run(`${kind} report`, async () => {
      job.queued = false;
      try {
        return await this.execute(job, source);
      } catch (error) {
        console.error(`[scheduler] ${kind} run aborted:`, error);
        job.state = "idle";
        job.lastStatus = "failed";
        job.lastError = describeError(error);
        return null;
      }
    });
  }

  runNow(kind: JobKind): Promise<RunOutcome | null> {
    return this.trigger(kind, "manual");
  }

  /** Queue a heartbeat unless one is already waiting. Never rejects. */
  async triggerHeartbeat(): Promise<HeartbeatResult | null> {
    if (this.stopped) return null;
    if (this.heartbeatQueued) {
      console.log("[scheduler] Heartbeat already queued; skipping");
      return null;
    }

    this.heartbeatQueued = true;
    try {
      return await this.options.lane.run("heartbeat", () => {
        this.heartbeatQueued = false;
        return this.options.session.heartbeat();
      });
    } catch (error) {
      console.warn(`[scheduler] Heartbeat could not reach the portal: ${describeError(error)}`);
      return null;
    }
  }

  /** Console `login`: interactive unless credentials are configured. Never rejects. */
  async login(): Promise<boolean> {
    try {
      await this.options.lane.run("login", () => this.options.session.login());
      return true;
    } catch (error) {
      console.error(`[scheduler] Login failed: ${describeError(error)}`);
      return false;
    }
  }

  status(): OrchestratorStatus {
    return {
      jobs: JOB_KINDS.map((kind) => ({ ...this.jobs[kind] })),
      session: this.options.session.snapshot(),
      lane: this.options.lane.getStats(),
      coalesced: this.coalesced,
      heartbeatQueued: this.heartbeatQueued,
    };
  }

  // ============================================================
  // JOB PIPELINE
  // ============================================================

  private async execute(job: Job, source: TriggerSource): Promise<RunOutcome> {
    const startedAt = this.now();
    const traceId = generateTraceId();

    job.state = "running";
    job.lastRunAt = startedAt;
    job.lastTrigger = source;

    let stage: Stage = "request";
    let request: ReportRequest | null = null;
    let raw: RawReport | null = null;
    let records: ReportRecord[] | null = null;
    let deliveries: NotificationResult[] = [];
    let error: unknown = null;

    try {
      request = buildReportRequest(job.kind, startedAt, this.options.timezone);
      console.log(`[scheduler] ▶ ${job.kind} report for ${request.range.label} (${source})`);
      trace({ event: "job_start", traceId, kind: job.kind, source, range: request.range });

      stage = "session";
      await this.options.session.ensureReady();

      stage = "fetch";
      raw = await this.options.fetcher.fetch(request);

      stage = "parse";
      records = this.options.parse(raw, job.kind);
      console.log(`[scheduler] Parsed ${records.length} records`);

      stage = "dispatch";
      const outcome = await this.options.dispatcher.dispatch(records, raw);
      deliveries = outcome.results;
      if (deliveries.every((r) => r.status === "failed")) {
        throw new DeliveryError(
          `Every channel failed: ${deliveries.map((r) => `${r.channel} (${r.error ?? "unknown"})`).join("; ")}`,
          { escalated: outcome.escalated }
        );
      }
    } catch (caught) {
      error = caught;
      await this.handleFailure(job, stage, caught, raw);
    }

    const finishedAt = this.now();
    const status = error === null ? "succeeded" : "failed";
    job.state = "idle";
    job.lastStatus = status;
    job.lastError = error === null ? null : describeError(error);

    const outcome: RunOutcome = {
      kind: job.kind,
      trigger: source,
      startedAt,
      finishedAt,
      status,
      rangeLabel: request ? request.range.label : UNKNOWN_RANGE,
      records: records ? records.length : null,
      deliveries,
      error: job.lastError,
      traceId,
    };

    console.log(`[scheduler] ■ ${job.kind} report ${status.toUpperCase()}`);
    trace({ event: "job_end", traceId, kind: job.kind, status, stage, error: job.lastError });
    await this.options.runLog.record(outcome);
    return outcome;
  }

  private async handleFailure(job: Job, stage: Stage, error: unknown, raw: RawReport | null): Promise<void> {
    console.error(`[scheduler] ${job.kind} report failed during ${stage}:`, error);

    if (error instanceof FormatError && raw) {
      const kept = raw.files.map((f) => f.savedPath).filter((p): p is string => p !== null);
      console.error(`[scheduler] Raw exports kept for diagnosis: ${kept.length > 0 ? kept.join(", ") : "none saved"}`);
    }

    if (error instanceof AuthError && stage !== "session") {
      try {
        await this.options.session.invalidate(describeError(error));
      } catch (invalidateError) {
        console.error(`[scheduler] Could not invalidate the session: ${describeError(invalidateError)}`);
      }
    }

    if (error instanceof DeliveryError && error.escalated) {
      console.log("[scheduler] Operator already alerted by the dispatcher");
      return;
    }
    if (error instanceof AuthError && stage === "session" && this.options.session.snapshot().awaitingInteractiveLogin) {
      console.log("[scheduler] Waiting for an interactive login; operator already alerted");
      return;
    }

    await this.options.dispatcher.escalate(`${job.kind} report failed during ${stage}: ${describeError(error)}`);
  }
}
