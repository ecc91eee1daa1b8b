/**
 * Runtime settings.
 *
 * All runtime code receives a Settings object built here instead of reading
 * process.env directly. Validation happens once at startup; any problem is a
 * ConfigError listing every issue, and the process exits.
 */

import { config as loadDotenv } from "dotenv";
import { join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { getObservabilityConfig } from "../../config/observability.ts";
import { ConfigError } from "../errors.ts";

const PROJECT_ROOT = fileURLToPath(new URL("../..", import.meta.url));

export const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface PortalCredentials {
  username: string;
  password: string;
}

export interface Settings {
  portal: {
    dashboardUrl: string;
    reportListUrl: string;
    /** null = interactive login only */
    credentials: PortalCredentials | null;
    headless: boolean;
    browserChannel: string | null;
    executablePath: string | null;
    stepTimeoutMs: number;
  };
  fetch: {
    maxAttempts: number;
    backoffMs: number;
  };
  comms: {
    apiUrl: string;
    apiKey: string;
  };
  recipients: {
    emailTo: string[];
    emailCc: string[];
    smsSenderNotify: string | null;
    escalationPhone: string | null;
  };
  telegram: {
    botToken: string | null;
    chatId: string | null;
  };
  schedule: {
    dailyTime: string;
    weeklyDay: Weekday;
    weeklyTime: string;
    testMode: boolean;
    testIntervalMinutes: number;
    heartbeatIntervalMinutes: number;
    timezone: string;
  };
  paths: {
    dataDir: string;
    sessionFile: string;
    downloadDir: string;
    logDir: string;
    runLogFile: string;
  };
  /** JSONL traces under paths.logDir */
  tracing: {
    enabled: boolean;
    retentionDays: number;
  };
  supabase: { url: string; anonKey: string } | null;
}

/** Command-line switches that take precedence over the environment. */
export interface SettingsOverrides {
  testMode?: boolean;
  headless?: boolean;
}

// ============================================================
// SCHEMA
// ============================================================

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const commaList = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)
  );

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : ["1", "true", "yes"].includes(v.trim().toLowerCase())));

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? String(fallback) : v.trim()))
    .pipe(z.coerce.number().int().positive());

const clockTime = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : fallback))
    .pipe(z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM (24-hour)"));

/** True for zones the runtime's Intl data knows ("Australia/Brisbane", "UTC"). */
export function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const phone = z.string().regex(/^\+\d{8,15}$/, "expected E.164 phone number, e.g. +61400000000");

const envSchema = z
  .object({
    PORTAL_DASHBOARD_URL: z.string({ required_error: "is required" }).url(),
    PORTAL_REPORT_LIST_URL: z.string({ required_error: "is required" }).url(),
    PORTAL_USERNAME: optionalString,
    PORTAL_PASSWORD: optionalString,
    BROWSER_HEADLESS: flag(false),
    BROWSER_CHANNEL: optionalString,
    BROWSER_EXECUTABLE_PATH: optionalString,
    STEP_TIMEOUT_MS: positiveInt(30_000),
    FETCH_MAX_ATTEMPTS: positiveInt(3),
    FETCH_BACKOFF_MS: positiveInt(2_000),
    COMMS_API_URL: z.string({ required_error: "is required" }).url(),
    COMMS_API_KEY: z.string({ required_error: "is required" }).min(1, "is required"),
    EMAIL_TO: commaList.pipe(
      z.array(z.string().email()).min(1, "at least one primary recipient is required")
    ),
    EMAIL_CC: commaList.pipe(z.array(z.string().email())),
    SMS_SENDER_NOTIFY: optionalString.pipe(phone.nullable()),
    ESCALATION_PHONE: optionalString.pipe(phone.nullable()),
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_CHAT_ID: optionalString,
    DAILY_REPORT_TIME: clockTime("13:00"),
    WEEKLY_REPORT_DAY: z
      .string()
      .optional()
      .transform((v) => (v && v.trim() ? v.trim().toLowerCase() : "saturday"))
      .pipe(z.enum(WEEKDAYS)),
    WEEKLY_REPORT_TIME: clockTime("08:00"),
    TEST_MODE: flag(false),
    // Minute-step cron: */60 and above only ever fire at minute 0
    TEST_INTERVAL_MINUTES: positiveInt(5).pipe(z.number().max(59, "must be at most 59")),
    HEARTBEAT_INTERVAL_MINUTES: positiveInt(60),
    USER_TIMEZONE: optionalString.pipe(
      z.string().refine(isTimeZone, "unknown time zone (expected an IANA name such as Australia/Brisbane)").nullable()
    ),
    SUPABASE_URL: optionalString,
    SUPABASE_ANON_KEY: optionalString,
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.PORTAL_USERNAME) !== Boolean(env.PORTAL_PASSWORD)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PORTAL_PASSWORD"],
        message: "PORTAL_USERNAME and PORTAL_PASSWORD must be set together",
      });
    }
    if (!env.ESCALATION_PHONE && !env.TELEGRAM_CHAT_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ESCALATION_PHONE"],
        message: "an escalation contact is required (ESCALATION_PHONE or TELEGRAM_CHAT_ID)",
      });
    }
    if (env.TELEGRAM_BOT_TOKEN && !env.TELEGRAM_CHAT_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TELEGRAM_CHAT_ID"],
        message: "TELEGRAM_CHAT_ID is required when TELEGRAM_BOT_TOKEN is set",
      });
    }
  });

// ============================================================
// LOADING
// ============================================================

/**
 * Load the project's .env into process.env (or into `target`). Variables
 * already present win, so systemd/pm2 settings override the file.
 */
export function loadEnvFile(path: string = join(PROJECT_ROOT, ".env"), target?: Record<string, string>): void {
  loadDotenv(target ? { path, processEnv: target } : { path });
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {}
): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const observability = getObservabilityConfig(env);

  return {
    portal: {
      dashboardUrl: e.PORTAL_DASHBOARD_URL,
      reportListUrl: e.PORTAL_REPORT_LIST_URL,
      credentials:
        e.PORTAL_USERNAME && e.PORTAL_PASSWORD
          ? { username: e.PORTAL_USERNAME, password: e.PORTAL_PASSWORD }
          : null,
      headless: overrides.headless ?? e.BROWSER_HEADLESS,
      browserChannel: e.BROWSER_EXECUTABLE_PATH ? null : e.BROWSER_CHANNEL ?? "chrome",
      executablePath: e.BROWSER_EXECUTABLE_PATH,
      stepTimeoutMs: e.STEP_TIMEOUT_MS,
    },
    fetch: {
      maxAttempts: e.FETCH_MAX_ATTEMPTS,
      backoffMs: e.FETCH_BACKOFF_MS,
    },
    comms: {
      apiUrl: e.COMMS_API_URL,
      apiKey: e.COMMS_API_KEY,
    },
    recipients: {
      emailTo: e.EMAIL_TO,
      emailCc: e.EMAIL_CC,
      smsSenderNotify: e.SMS_SENDER_NOTIFY,
      escalationPhone: e.ESCALATION_PHONE,
    },
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      chatId: e.TELEGRAM_CHAT_ID,
    },
    schedule: {
      dailyTime: e.DAILY_REPORT_TIME,
      weeklyDay: e.WEEKLY_REPORT_DAY,
      weeklyTime: e.WEEKLY_REPORT_TIME,
      testMode: overrides.testMode ?? e.TEST_MODE,
      testIntervalMinutes: e.TEST_INTERVAL_MINUTES,
      heartbeatIntervalMinutes: e.HEARTBEAT_INTERVAL_MINUTES,
      timezone: e.USER_TIMEZONE ?? Intl.DateTimeFormat().resolvedOptions().timeZone,
    },
    paths: {
      dataDir: observability.dataDir,
      sessionFile: join(observability.dataDir, "session.json"),
      downloadDir: join(observability.dataDir, "downloads"),
      logDir: observability.logDir,
      runLogFile: observability.runLogFile,
    },
    tracing: {
      enabled: observability.enabled,
      retentionDays: observability.retentionDays,
    },
    supabase:
      e.SUPABASE_URL && e.SUPABASE_ANON_KEY
        ? { url: e.SUPABASE_URL, anonKey: e.SUPABASE_ANON_KEY }
        : null,
  };
}
