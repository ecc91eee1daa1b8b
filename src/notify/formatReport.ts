/**
 * Message formatting for report deliveries, delivery-status reports and
 * operator escalations. Pure string builders.
 */

import type { ReportRecord, ReportRequest, ReportSection, ReportType } from "../reports/types.ts";
import type { NotificationResult, Channel } from "./types.ts";

export interface ReportCounts {
  arrivals: number;
  departures: number;
}

export interface EmailContent {
  subject: string;
  text: string;
  html: string;
}

const SUBJECT_PREFIX: Record<ReportType, string> = {
  daily: "Tomorrow's Cleaning",
  weekly: "Weekly Cleaning",
};

const SECTION_TITLE: Record<ReportSection, string> = {
  arrivals: "Arrivals",
  departures: "Departures",
};

const CHANNEL_LABEL: Record<Channel, string> = {
  email: "Email",
  sms: "SMS to sender",
  chat: "Chat",
};

export const ESCALATION_SUBJECT = "🚨 CRITICAL: Occupancy report relay FAILED";

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function countSections(records: readonly ReportRecord[]): ReportCounts {
  return {
    arrivals: records.filter((r) => r.section === "arrivals").length,
    departures: records.filter((r) => r.section === "departures").length,
  };
}

/** "1 checking in, 2 checking out" */
export function summaryLine(counts: ReportCounts): string {
  return `${counts.arrivals} checking in, ${counts.departures} checking out`;
}

export function formatSubject(request: ReportRequest, counts: ReportCounts): string {
  return `${SUBJECT_PREFIX[request.reportType]} ${request.range.label}: ${summaryLine(counts)}`;
}

function guestWord(n: number): string {
  return n === 1 ? "guest" : "guests";
}

/** "101 (2 Bed Apartment): Jane Citizen, 3 guests, check-in 14:00" */
export function formatRecordLine(record: ReportRecord): string {
  const room = record.roomType ? `${record.property} (${record.roomType})` : record.property;
  const time =
    record.section === "arrivals" ? `check-in ${record.checkIn ?? "-"}` : `check-out ${record.checkOut ?? "-"}`;
  return `${room}: ${record.guestName}, ${record.guestCount} ${guestWord(record.guestCount)}, ${time}`;
}

function sectionLines(records: readonly ReportRecord[], section: ReportSection, bullet: string): string[] {
  const rows = records.filter((r) => r.section === section);
  const title = SECTION_TITLE[section];
  if (rows.length === 0) return [`${title}: none scheduled`];
  return [`${title} (${rows.length}):`, ...rows.map((r) => `${bullet} ${formatRecordLine(r)}`)];
}

// ============================================================
// EMAIL
// ============================================================

const CELL = "border: 1px solid #ddd; padding: 8px; text-align: left; vertical-align: top;";

function htmlTable(records: readonly ReportRecord[], section: ReportSection): string {
  const rows = records.filter((r) => r.section === section);
  const title = SECTION_TITLE[section];
  if (rows.length === 0) {
    return `<p>No ${title.toLowerCase()} scheduled.</p>`;
  }

  const timeLabel = section === "arrivals" ? "Check-in" : "Check-out";
  const header = ["Room", "Type", "Guest", "Guests", timeLabel]
    .map((h) => `<th style="${CELL}">${h}</th>`)
    .join("");

  const body = rows
    .map((r) => {
      const pax = `${r.guests.adults} adults<br>${r.guests.children} children<br>${r.guests.infants} infants`;
      const time = (section === "arrivals" ? r.checkIn : r.checkOut) ?? "-";
      const cells = [
        `<b>${escapeHtml(r.property)}</b>`,
        escapeHtml(r.roomType ?? "-"),
        escapeHtml(r.guestName),
        pax,
        `<b>${escapeHtml(time)}</b>`,
      ];
      return `<tr>${cells.map((c) => `<td style="${CELL}">${c}</td>`).join("")}</tr>`;
    })
    .join("");

  return (
    `<h3>${title} (${rows.length})</h3>` +
    `<table style="border-collapse: collapse; width: 100%; font-family: sans-serif;">` +
    `<tr style="background-color: #f2f2f2;">${header}</tr>${body}</table>`
  );
}

export function formatEmail(records: readonly ReportRecord[], request: ReportRequest): EmailContent {
  const counts = countSections(records);
  const label = request.range.label;

  const text = [
    "Hi,",
    "",
    `Please find attached the cleaning reports for ${label}.`,
    "",
    "Summary:",
    `- Arrivals: ${counts.arrivals} checking in`,
    `- Departures: ${counts.departures} checking out`,
    "",
    ...sectionLines(records, "arrivals", "-"),
    "",
    ...sectionLines(records, "departures", "-"),
    "",
  ].join("\n");

  const html =
    `<div style="font-family: sans-serif; line-height: 1.6; color: #333;">` +
    `<h2 style="color: #2c3e50;">Cleaning Reports for ${escapeHtml(label)}</h2>` +
    `<div style="margin-bottom: 20px; padding: 15px; background-color: #e8f4fd; border-radius: 5px;">` +
    `<strong>Summary:</strong><br>Checking In: <b>${counts.arrivals}</b> rooms<br>Checking Out: <b>${counts.departures}</b> rooms</div>` +
    htmlTable(records, "arrivals") +
    "<br>" +
    htmlTable(records, "departures") +
    `<hr style="border: 0; border-top: 1px solid #eee; margin: 20px 0;">` +
    `<p style="font-size: 0.9em; color: #777;"><i>Attached: PDF Reports (Official)</i></p>` +
    `</div>`;

  return { subject: formatSubject(request, counts), text, html };
}

// ============================================================
// SMS / CHAT
// ============================================================

export function formatSms(records: readonly ReportRecord[], request: ReportRequest): string {
  return `${formatSubject(request, countSections(records))}. Check your email for details.`;
}

export function formatChatSummary(records: readonly ReportRecord[], request: ReportRequest): string {
  return [
    `📋 ${formatSubject(request, countSections(records))}`,
    "",
    ...sectionLines(records, "arrivals", "•"),
    "",
    ...sectionLines(records, "departures", "•"),
  ].join("\n");
}

export function formatDeliveryStatus(
  request: ReportRequest,
  counts: ReportCounts,
  results: readonly NotificationResult[]
): string {
  const lines = results.map((r) => {
    const status = r.status === "sent" ? "✅ Sent" : `❌ FAILED${r.error ? ` (${r.error})` : ""}`;
    return `• ${CHANNEL_LABEL[r.channel]}: ${status}`;
  });
  return [`📊 Report Delivery Status for ${request.range.label}:`, ...lines, "", `Summary: ${summaryLine(counts)}`].join(
    "\n"
  );
}

export function formatEscalation(reason: string): string {
  return `URGENT: The occupancy report relay needs attention.\n\nError: ${reason}\n\nPlease check the server.`;
}
