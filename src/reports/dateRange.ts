/**
 * Report date ranges, computed in the configured local timezone.
 *
 * Do NOT use toISOString().slice(0,10) on "now": that is the UTC day, and at
 * 7 AM in UTC+10 the UTC day is still yesterday.
 */

import type { DateRange, ReportRequest, ReportType } from "./types.ts";

const WEEKLY_SPAN_DAYS = 7;

const monthFormat = new Intl.DateTimeFormat("en-US", { month: "short", timeZone: "UTC" });
const weekdayFormat = new Intl.DateTimeFormat("en-US", { weekday: "long", timeZone: "UTC" });

/** YYYY-MM-DD for the given instant in timeZone (en-CA always formats as YYYY-MM-DD). */
export function localDate(now: Date, timeZone: string): string {
  return now.toLocaleDateString("en-CA", { timeZone });
}

/** Calendar arithmetic on a YYYY-MM-DD string. */
export function addDays(isoDate: string, days: number): string {
  const d = new Date(`${isoDate}T00:00:00.000Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** "2026-10-20" → "20 Oct (Tuesday)" */
export function formatDayLabel(isoDate: string): string {
  const d = new Date(`${isoDate}T00:00:00.000Z`);
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${day} ${monthFormat.format(d)} (${weekdayFormat.format(d)})`;
}

/**
 * Daily reports cover tomorrow; weekly reports cover the seven days starting
 * tomorrow.
 */
export function rangeFor(reportType: ReportType, now: Date, timeZone: string): DateRange {
  const tomorrow = addDays(localDate(now, timeZone), 1);

  if (reportType === "daily") {
    return { from: tomorrow, to: tomorrow, label: formatDayLabel(tomorrow), preset: "tomorrow" };
  }

  const last = addDays(tomorrow, WEEKLY_SPAN_DAYS - 1);
  return {
    from: tomorrow,
    to: last,
    label: `${formatDayLabel(tomorrow)} to ${formatDayLabel(last)}`,
    preset: null,
  };
}

export function buildReportRequest(reportType: ReportType, now: Date, timeZone: string): ReportRequest {
  return { reportType, range: rangeFor(reportType, now, timeZone) };
}
