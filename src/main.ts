/**
 * Occupancy Report Relay
 *
 * Long-running process: keeps a logged-in portal session, pulls the
 * arrival/departure reports on schedule or on demand, and sends them to the
 * cleaning team. Run: npm start (see src/cli/args.ts for flags).
 */

import { parseCliArgs, USAGE } from "./cli/args.ts";
import { loadEnvFile, loadSettings, type Settings } from "./config/settings.ts";
import { OperatorConsole } from "./console/operatorConsole.ts";
import { ConfigError, describeError } from "./errors.ts";
import { CommsCentreSink } from "./notify/commsCentreSink.ts";
import { NotificationDispatcher } from "./notify/dispatcher.ts";
import { TelegramSink } from "./notify/telegramSink.ts";
import { PlaywrightPortal } from "./portal/playwrightPortal.ts";
import { SessionLane } from "./queue/sessionLane.ts";
import { ReportFetcher } from "./reports/reportFetcher.ts";
import { parse } from "./reports/reportParser.ts";
import { Orchestrator } from "./scheduler/orchestrator.ts";
import { buildSchedules } from "./scheduler/schedule.ts";
import { SessionManager } from "./session/sessionManager.ts";
import { RunLog, supabaseMirror } from "./utils/runLog.ts";
import { createSupabaseClient } from "./utils/supabase.ts";
import { configureTracer, flushTraces, trace } from "./utils/tracer.ts";

const SHUTDOWN_GRACE_MS = 30_000;

// ============================================================
// CONFIGURATION
// ============================================================

const cli = parseCliArgs(process.argv.slice(2));

if (cli.help) {
  console.log(USAGE);
  process.exit(0);
}
if (cli.unknown.length > 0) {
  console.error(`Unknown argument(s): ${cli.unknown.join(" ")}\n`);
  console.error(USAGE);
  process.exit(1);
}

loadEnvFile();

let settings: Settings;
try {
  settings = loadSettings(process.env, {
    testMode: cli.testMode ? true : undefined,
    headless: cli.headless ? true : undefined,
  });
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

configureTracer({ logDir: settings.paths.logDir, ...settings.tracing });

// ============================================================
// WIRING
// ============================================================

const operatorConsole = new OperatorConsole({
  input: process.stdin,
  output: process.stdout,
  timeZone: settings.schedule.timezone,
});

const portal = new PlaywrightPortal({ ...settings.portal, operator: operatorConsole });

const comms = new CommsCentreSink({ apiUrl: settings.comms.apiUrl, apiKey: settings.comms.apiKey });
const chatSink =
  settings.telegram.botToken && settings.telegram.chatId
    ? TelegramSink.fromToken(settings.telegram.botToken, settings.telegram.chatId)
    : comms;

const dispatcher = new NotificationDispatcher({
  sinks: { email: comms, sms: comms, chat: chatSink },
  recipients: { ...settings.recipients, chatEnabled: settings.telegram.chatId !== null },
});

const session = new SessionManager({
  portal,
  sessionFile: settings.paths.sessionFile,
  hasCredentials: settings.portal.credentials !== null,
  escalate: async (reason) => {
    await dispatcher.escalate(reason);
  },
});

console.log("Starting Occupancy Report Relay...");
console.log(`Portal: ${settings.portal.dashboardUrl}`);
console.log(`Login: ${settings.portal.credentials ? "credentials" : "interactive"} (${settings.portal.headless ? "headless" : "headed"})`);
console.log(`Email to: ${settings.recipients.emailTo.join(", ")}`);
console.log(`Chat: ${chatSink === comms ? "via Comms Centre" : "Telegram bot"}${settings.telegram.chatId ? "" : " (disabled)"}`);
console.log(`Data directory: ${settings.paths.dataDir}`);

// ============================================================
// RECORD MODE
// ============================================================

async function runRecordMode(): Promise<void> {
  console.log("[record] Recording mode: every page you visit is printed here.");
  const restored = await session.restore();
  if (restored.status !== "valid") {
    await session.login("interactive");
  }

  const stop = await portal.recordNavigation((url) => {
    console.log(`[record] ${new Date().toISOString()} ${url}`);
  });
  await operatorConsole.waitForConfirmation("Navigate the portal in the browser. Press ENTER here to stop recording.");
  stop();
}

if (cli.record) {
  try {
    await runRecordMode();
  } catch (error) {
    console.error(`[record] ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    operatorConsole.close();
    await portal.close();
  }
  process.exit();
}

// ============================================================
// SCHEDULER
// ============================================================

const supabase = createSupabaseClient(settings.supabase);
const runLog = new RunLog(settings.paths.runLogFile, supabase ? supabaseMirror(supabase) : null);

const orchestrator = new Orchestrator({
  lane: new SessionLane(),
  session,
  fetcher: new ReportFetcher(portal, {
    downloadDir: settings.paths.downloadDir,
    maxAttempts: settings.fetch.maxAttempts,
    backoffMs: settings.fetch.backoffMs,
  }),
  parse,
  dispatcher,
  runLog,
  schedules: buildSchedules(settings.schedule),
  timezone: settings.schedule.timezone,
  heartbeatIntervalMinutes: settings.schedule.heartbeatIntervalMinutes,
  closePortal: () => portal.close(),
});

let shuttingDown = false;

async function shutdown(reason: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`Received ${reason}, shutting down gracefully...`);
  operatorConsole.close();
  await orchestrator.stop(SHUTDOWN_GRACE_MS);
  await flushTraces();
  process.exit(0);
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("uncaughtException", (error) => {
  console.error("Uncaught exception:", error);
});
process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
});

// ============================================================
// STARTUP
// ============================================================

operatorConsole.open();

const restored = await session.establish();

orchestrator.start();
operatorConsole.attach({
  runNow: (kind) => orchestrator.runNow(kind),
  triggerHeartbeat: () => orchestrator.triggerHeartbeat(),
  login: () => orchestrator.login(),
  status: () => orchestrator.status(),
  quit: () => shutdown("quit"),
});

trace({ event: "startup", testMode: settings.schedule.testMode, restored: restored.status });

if (restored.status === "valid") {
  void orchestrator.triggerHeartbeat();
}
if (cli.runNow) {
  void orchestrator.trigger("daily", "startup");
}
if (cli.runWeekly) {
  void orchestrator.trigger("weekly", "startup");
}

console.log("Relay is running.");
