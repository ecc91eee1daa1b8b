/**
 * Portal page vocabulary: visible texts and CSS selectors the automation
 * relies on. Kept in one place so a portal UI change is a one-file fix.
 */

import type { ReportFormat, ReportSection } from "../reports/types.ts";

export const REPORT_LINK_TEXT: Record<ReportSection, string> = {
  arrivals: "Arrival Report",
  departures: "Departure Report",
};

export const EXPORT_FORMAT_TEXT: Record<ReportFormat, string> = {
  pdf: "Acrobat (PDF) file",
  csv: "CSV (comma delimited)",
};

export const TOMORROW_TEXT = "Tomorrow";

export const SELECTORS = {
  previewButton: "a#btnPreviewBookingDate",
  dateFrom: "input#txtFromDate",
  dateTo: "input#txtToDate",
  exportButton: "[title='Export']",
  exportMenuFallback: "li#trv-main-menu-export-command > a",
  // Hosted sign-in form
  username: "input#signInName, input#email, input[type='email']",
  password: "input#password, input[type='password']",
  submit: "button#next, button[type='submit']",
} as const;

/** URL fragments that mean the browser was bounced to the sign-in flow. */
export const SIGN_IN_MARKERS = ["b2clogin", "/login", "/signin", "/account/login"];

export const VIEWPORT = { width: 1280, height: 800 };
