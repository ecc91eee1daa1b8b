/**
 * Centralised observability configuration.
 *
 * Externalises the data directory, log directory, retention period and the
 * tracing flag so they can be changed via environment variables without
 * touching source files.
 *
 * Read by src/config/settings.ts when settings are loaded.
 */

import { homedir } from "os";
import { join } from "path";

export interface ObservabilityConfig {
  /** Root directory for session state, downloads and logs. */
  dataDir: string;
  /** Directory where JSONL trace files and the run log are written. */
  logDir: string;
  /** Append-only, human-readable log of job outcomes. */
  runLogFile: string;
  /** Number of days to retain trace files before cleanup. */
  retentionDays: number;
  /** Whether structured tracing is active. Enable with OBSERVABILITY_ENABLED=1. */
  enabled: boolean;
}

/**
 * Returns the data directory root.
 *
 * Override via .env:
 *   DATA_DIR absolute path (default: ~/.occupancy-relay)
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DATA_DIR || join(env.HOME || homedir(), ".occupancy-relay");
}

/**
 * Returns the current observability configuration resolved from
 * environment variables with defaults.
 *
 * Override defaults via .env:
 *   DATA_DIR              root directory (default: ~/.occupancy-relay)
 *   LOG_DIR               log directory (default: {DATA_DIR}/logs)
 *   LOG_RETENTION_DAYS    days to keep trace files (default: 30)
 *   OBSERVABILITY_ENABLED set to "1" or "true" to enable (default: off)
 */
export function getObservabilityConfig(
  env: NodeJS.ProcessEnv = process.env
): ObservabilityConfig {
  const dataDir = getDataDir(env);
  const logDir = env.LOG_DIR || join(dataDir, "logs");

  return {
    dataDir,
    logDir,
    runLogFile: join(logDir, "runs.log"),
    retentionDays: Number(env.LOG_RETENTION_DAYS) || 30,
    enabled: ["1", "true"].includes((env.OBSERVABILITY_ENABLED || "").toLowerCase()),
  };
}
