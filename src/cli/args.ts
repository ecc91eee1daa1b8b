/**
 * Command-line flags.
 *
 *   (none)         production schedule
 *   --test         both jobs every TEST_INTERVAL_MINUTES
 *   --run-now      run the daily report at startup, then schedule
 *   --run-weekly   run the weekly report at startup, then schedule
 *   --record       open the portal and log every page visited; no schedule
 *   --headless     no visible browser (credential login only)
 */

export interface CliOptions {
  testMode: boolean;
  runNow: boolean;
  runWeekly: boolean;
  record: boolean;
  headless: boolean;
  help: boolean;
  unknown: string[];
}

const KNOWN = new Set(["--test", "--run-now", "--run-weekly", "--record", "--headless", "--help", "-h"]);

export const USAGE = `Usage: npm start -- [--test] [--run-now | --run-weekly] [--record] [--headless]

  --test         run both reports every TEST_INTERVAL_MINUTES instead of the real schedule
  --run-now      run the daily report immediately, then keep the schedule
  --run-weekly   run the weekly report immediately, then keep the schedule
  --record       open the portal and print every page visited (no schedule)
  --headless     run the browser without a window (needs PORTAL_USERNAME/PORTAL_PASSWORD)`;

export function parseCliArgs(args: string[]): CliOptions {
  return {
    testMode: args.includes("--test"),
    runNow: args.includes("--run-now"),
    runWeekly: args.includes("--run-weekly"),
    record: args.includes("--record"),
    headless: args.includes("--headless"),
    help: args.includes("--help") || args.includes("-h"),
    unknown: args.filter((a) => !KNOWN.has(a)),
  };
}
