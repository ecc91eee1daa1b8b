import { describe, test, expect } from "vitest";
import {
  countSections,
  escapeHtml,
  formatDeliveryStatus,
  formatEmail,
  formatEscalation,
  formatRecordLine,
  formatSubject,
} from "./formatReport.ts";
import type { ReportRecord, ReportRequest } from "../reports/types.ts";

const DAILY: ReportRequest = {
  reportType: "daily",
  range: { from: "2026-10-20", to: "2026-10-20", label: "20 Oct (Tuesday)", preset: "tomorrow" },
};

const WEEKLY: ReportRequest = {
  reportType: "weekly",
  range: { from: "2026-10-20", to: "2026-10-26", label: "20 Oct (Tuesday) to 26 Oct (Monday)", preset: null },
};

const ARRIVAL: ReportRecord = {
  section: "arrivals",
  property: "101",
  roomType: "2 Bed <Deluxe>",
  guestName: "Jane & Co",
  guests: { adults: 2, children: 1, infants: 0 },
  guestCount: 3,
  checkIn: "14:00",
  checkOut: null,
};

const DEPARTURE: ReportRecord = {
  section: "departures",
  property: "205",
  roomType: null,
  guestName: "Sam Example",
  guests: { adults: 1, children: 0, infants: 0 },
  guestCount: 1,
  checkIn: null,
  checkOut: null,
};

describe("subject", () => {
  test("daily", () => {
    expect(formatSubject(DAILY, countSections([ARRIVAL, DEPARTURE]))).toBe(
      "Tomorrow's Cleaning 20 Oct (Tuesday): 1 checking in, 1 checking out"
    );
  });

  test("weekly", () => {
    expect(formatSubject(WEEKLY, { arrivals: 0, departures: 0 })).toBe(
      "Weekly Cleaning 20 Oct (Tuesday) to 26 Oct (Monday): 0 checking in, 0 checking out"
    );
  });
});

describe("formatRecordLine", () => {
  test("arrival with room type", () => {
    expect(formatRecordLine(ARRIVAL)).toBe("101 (2 Bed <Deluxe>): Jane & Co, 3 guests, check-in 14:00");
  });

  test("departure without time or room type", () => {
    expect(formatRecordLine(DEPARTURE)).toBe("205: Sam Example, 1 guest, check-out -");
  });
});

describe("formatEmail", () => {
  test("text body lists both sections", () => {
    const { text } = formatEmail([ARRIVAL, DEPARTURE], DAILY);
    expect(text.split("\n")).toEqual([
      "Hi,",
      "",
      "Please find attached the cleaning reports for 20 Oct (Tuesday).",
      "",
      "Summary:",
      "- Arrivals: 1 checking in",
      "- Departures: 1 checking out",
      "",
      "Arrivals (1):",
      "- 101 (2 Bed <Deluxe>): Jane & Co, 3 guests, check-in 14:00",
      "",
      "Departures (1):",
      "- 205: Sam Example, 1 guest, check-out -",
      "",
    ]);
  });

  test("html escapes portal values", () => {
    const { html } = formatEmail([ARRIVAL], DAILY);
    expect(html).toContain(">2 Bed &lt;Deluxe&gt;</td>");
    expect(html).toContain(">Jane &amp; Co</td>");
    expect(html).toContain("<h3>Arrivals (1)</h3>");
    expect(html).toContain("<p>No departures scheduled.</p>");
  });

  test("empty report still renders", () => {
    const email = formatEmail([], DAILY);
    expect(email.subject).toBe("Tomorrow's Cleaning 20 Oct (Tuesday): 0 checking in, 0 checking out");
    expect(email.html).toContain("<p>No arrivals scheduled.</p>");
  });
});

describe("formatDeliveryStatus", () => {
  test("marks failures with their reason", () => {
    const text = formatDeliveryStatus(DAILY, { arrivals: 2, departures: 3 }, [
      { channel: "email", status: "failed", error: "DeliveryError: HTTP 500" },
      { channel: "sms", status: "sent" },
    ]);
    expect(text).toBe(
      [
        "📊 Report Delivery Status for 20 Oct (Tuesday):",
        "• Email: ❌ FAILED (DeliveryError: HTTP 500)",
        "• SMS to sender: ✅ Sent",
        "",
        "Summary: 2 checking in, 3 checking out",
      ].join("\n")
    );
  });
});

test("escapeHtml", () => {
  expect(escapeHtml(`<a href="x">&</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;");
});

test("formatEscalation", () => {
  expect(formatEscalation("portal down")).toBe(
    "URGENT: The occupancy report relay needs attention.\n\nError: portal down\n\nPlease check the server."
  );
});
