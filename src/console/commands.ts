/**
 * Runtime console commands.
 */

import type { JobKind, OrchestratorStatus } from "../scheduler/orchestrator.ts";

export type ConsoleCommand =
  | { type: "run"; kind: JobKind }
  | { type: "heartbeat" }
  | { type: "login" }
  | { type: "status" }
  | { type: "help" }
  | { type: "quit" }
  | { type: "unknown"; input: string };

export const HELP_TEXT = [
  "Commands:",
  "  run daily now | daily | <ENTER>   run the daily report now",
  "  run weekly now | weekly           run the weekly report now",
  "  heartbeat                         check the portal session now",
  "  login                             log in again (interactive unless credentials are set)",
  "  status                            show jobs, session and queue",
  "  help                              show this list",
  "  quit                              finish queued work and exit",
].join("\n");

export function parseCommand(line: string): ConsoleCommand {
  const input = line.trim().toLowerCase().replace(/\s+/g, " ");

  switch (input) {
    case "":
    case "daily":
    case "run daily":
    case "run daily now":
      return { type: "run", kind: "daily" };
    case "weekly":
    case "run weekly":
    case "run weekly now":
      return { type: "run", kind: "weekly" };
    case "heartbeat":
      return { type: "heartbeat" };
    case "login":
      return { type: "login" };
    case "status":
      return { type: "status" };
    case "help":
    case "?":
      return { type: "help" };
    case "quit":
    case "exit":
      return { type: "quit" };
    default:
      return { type: "unknown", input: line.trim() };
  }
}

function formatTime(date: Date | null, timeZone: string): string {
  if (!date) return "never";
  // sv-SE formats as "YYYY-MM-DD HH:MM:SS"
  return date.toLocaleString("sv-SE", { timeZone });
}

export function formatStatus(status: OrchestratorStatus, timeZone: string): string {
  const lines = ["Jobs:"];
  for (const job of status.jobs) {
    const state = job.state === "running" ? "RUNNING" : job.queued ? "queued" : "idle";
    const last = job.lastStatus
      ? `${job.lastStatus} (${job.lastTrigger ?? "?"}) at ${formatTime(job.lastRunAt, timeZone)}`
      : "not run yet";
    lines.push(`  ${job.kind.padEnd(7)} ${state.padEnd(8)} ${job.schedule}; last: ${last}`);
    if (job.lastStatus === "failed" && job.lastError) {
      lines.push(`          error: ${job.lastError}`);
    }
  }

  const s = status.session;
  const session = s.awaitingInteractiveLogin
    ? "EXPIRED, waiting for `login`"
    : s.alive
      ? "alive"
      : s.savedAt
        ? "restored, not yet checked"
        : "not logged in";
  lines.push(
    `Session: ${session}; last checked ${formatTime(s.lastCheckedAt, timeZone)}; ` +
      `credentials ${s.hasCredentials ? "configured" : "not configured"}`
  );

  const lane = status.lane;
  lines.push(
    `Queue: ${lane.current ? `running "${lane.current}"` : "idle"}, ${lane.depth} waiting` +
      (status.heartbeatQueued ? " (heartbeat queued)" : "") +
      `; ${status.coalesced} trigger(s) coalesced`
  );
  return lines.join("\n");
}
