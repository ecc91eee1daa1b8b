/**
 * Report domain types: what is requested from the portal, what comes back,
 * and the structured rows handed to the notification dispatcher.
 */

export type ReportType = "daily" | "weekly";

export type ReportSection = "arrivals" | "departures";

export const REPORT_SECTIONS: readonly ReportSection[] = ["arrivals", "departures"];

export type ReportFormat = "csv" | "pdf";

export interface DateRange {
  /** First day, YYYY-MM-DD in the configured timezone */
  from: string;
  /** Last day (inclusive), YYYY-MM-DD */
  to: string;
  /** Human label used in subjects, e.g. "20 Oct (Tuesday)" */
  label: string;
  /** Portal shortcut to click instead of typing dates */
  preset: "tomorrow" | null;
}

export interface ReportRequest {
  reportType: ReportType;
  range: DateRange;
}

export interface DownloadedFile {
  section: ReportSection;
  format: ReportFormat;
  fileName: string;
  data: Buffer;
  /** Audit copy on disk, null when the copy could not be written */
  savedPath: string | null;
}

export interface RawReport {
  request: ReportRequest;
  files: DownloadedFile[];
}

export interface GuestCounts {
  adults: number;
  children: number;
  infants: number;
}

export interface ReportRecord {
  readonly section: ReportSection;
  /** Room / unit identifier as printed by the portal */
  readonly property: string;
  readonly roomType: string | null;
  readonly guestName: string;
  readonly guests: Readonly<GuestCounts>;
  readonly guestCount: number;
  /** Check-in time for arrivals, null for departures */
  readonly checkIn: string | null;
  /** Check-out time for departures, null for arrivals */
  readonly checkOut: string | null;
}
