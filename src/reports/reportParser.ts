/**
 * Report parser: portal CSV exports → ReportRecord[].
 *
 * Pure and deterministic. The portal's CSV export names its columns after the
 * report designer's text boxes, so the mapping below is fixed. A payload that
 * does not look like that export raises FormatError; an export with headers
 * and no data rows is a legitimate empty report ("no arrivals tomorrow").
 */

import { parse as parseCsv } from "csv-parse/sync";
import { FormatError } from "../errors.ts";
import {
  REPORT_SECTIONS,
  type DownloadedFile,
  type RawReport,
  type ReportRecord,
  type ReportSection,
  type ReportType,
} from "./types.ts";

export const COLUMNS = {
  room: "textBox4",
  adults: "textBox6",
  children: "textBox7",
  infants: "textBox8",
  time: "textBox10",
  roomType: "textBox16",
  guestName: "textBox19",
} as const;

const REQUIRED_COLUMNS = [
  COLUMNS.room,
  COLUMNS.adults,
  COLUMNS.children,
  COLUMNS.infants,
  COLUMNS.time,
];

const DEFAULT_GUEST_NAME = "Guest";

/**
 * A data row's room cell starts with a digit ("12", "3-04", "101 A").
 * Summary rows ("Total arrivals:", "Daily totals:") and blanks do not.
 */
export function isDataRow(room: string): boolean {
  return /^\d/.test(room.replace(/[\s-]/g, ""));
}

function readCount(value: string | undefined, column: string, section: ReportSection, line: number): number {
  const trimmed = (value ?? "").trim();
  if (trimmed === "") return 0;
  if (!/^\d+$/.test(trimmed)) {
    throw new FormatError(`${section} CSV line ${line}: ${column} is not a whole number ("${trimmed}")`);
  }
  return Number(trimmed);
}

function readRows(file: DownloadedFile): Record<string, string>[] {
  let rows: string[][];
  try {
    rows = parseCsv(file.data, { bom: true, relax_column_count: true, skip_empty_lines: true });
  } catch (error) {
    throw new FormatError(`${file.section} CSV is not parseable: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  const [header, ...body] = rows;
  if (!header) {
    throw new FormatError(`${file.section} CSV is empty (no header row)`);
  }

  const columns = header.map((h) => h.trim());
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new FormatError(`${file.section} CSV is missing expected columns: ${missing.join(", ")}`);
  }

  return body.map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((name, i) => {
      row[name] = (cells[i] ?? "").trim();
    });
    return row;
  });
}

function parseSection(file: DownloadedFile): ReportRecord[] {
  const records: ReportRecord[] = [];

  readRows(file).forEach((row, index) => {
    const room = row[COLUMNS.room] ?? "";
    if (!isDataRow(room)) return;

    // +2: header is line 1 and rows are 0-based
    const line = index + 2;
    const guests = Object.freeze({
      adults: readCount(row[COLUMNS.adults], COLUMNS.adults, file.section, line),
      children: readCount(row[COLUMNS.children], COLUMNS.children, file.section, line),
      infants: readCount(row[COLUMNS.infants], COLUMNS.infants, file.section, line),
    });
    const time = row[COLUMNS.time] || null;

    records.push(
      Object.freeze({
        section: file.section,
        property: room,
        roomType: row[COLUMNS.roomType] || null,
        guestName: row[COLUMNS.guestName] || DEFAULT_GUEST_NAME,
        guests,
        guestCount: guests.adults + guests.children + guests.infants,
        checkIn: file.section === "arrivals" ? time : null,
        checkOut: file.section === "departures" ? time : null,
      })
    );
  });

  return records;
}

/**
 * Parse every section's CSV export. Arrivals come first, then departures,
 * each in file order.
 */
export function parse(raw: RawReport, reportType: ReportType): ReportRecord[] {
  if (raw.request.reportType !== reportType) {
    throw new FormatError(`Expected a ${reportType} report, got ${raw.request.reportType}`);
  }

  return REPORT_SECTIONS.flatMap((section) => {
    const csv = raw.files.find((f) => f.section === section && f.format === "csv");
    if (!csv) {
      throw new FormatError(`No CSV export for ${section} in the ${reportType} report`);
    }
    return parseSection(csv);
  });
}
