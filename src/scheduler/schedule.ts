/**
 * Cron expressions for the report jobs.
 */

import { WEEKDAYS, type Settings } from "../config/settings.ts";
import type { ReportType } from "../reports/types.ts";

export interface JobSchedule {
  cron: string;
  /** Human readable, for logs and `status` */
  description: string;
}

function splitTime(time: string): { hour: number; minute: number } {
  const [hour, minute] = time.split(":").map(Number);
  return { hour: hour ?? 0, minute: minute ?? 0 };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** "13:00" → "0 13 * * *" */
export function dailyCron(time: string): string {
  const { hour, minute } = splitTime(time);
  return `${minute} ${hour} * * *`;
}

/** ("saturday", "08:00") → "0 8 * * 6" */
export function weeklyCron(day: Settings["schedule"]["weeklyDay"], time: string): string {
  const { hour, minute } = splitTime(time);
  return `${minute} ${hour} * * ${WEEKDAYS.indexOf(day)}`;
}

export function buildSchedules(schedule: Settings["schedule"]): Record<ReportType, JobSchedule> {
  if (schedule.testMode) {
    const every = schedule.testIntervalMinutes;
    const test: JobSchedule = {
      cron: `*/${every} * * * *`,
      description: `every ${every} minute${every === 1 ? "" : "s"} (test mode)`,
    };
    return { daily: test, weekly: { ...test } };
  }

  return {
    daily: {
      cron: dailyCron(schedule.dailyTime),
      description: `daily at ${schedule.dailyTime}`,
    },
    weekly: {
      cron: weeklyCron(schedule.weeklyDay, schedule.weeklyTime),
      description: `every ${capitalize(schedule.weeklyDay)} at ${schedule.weeklyTime}`,
    },
  };
}
