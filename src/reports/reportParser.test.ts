import { describe, test, expect } from "vitest";
import { parse, isDataRow } from "./reportParser.ts";
import { FormatError } from "../errors.ts";
import type { DownloadedFile, RawReport, ReportSection } from "./types.ts";

const HEADER = "textBox4,textBox16,textBox6,textBox7,textBox8,textBox10,textBox19";

function csv(section: ReportSection, lines: string[]): DownloadedFile {
  return {
    section,
    format: "csv",
    fileName: `${section}_20261020.csv`,
    data: Buffer.from(lines.join("\r\n"), "utf-8"),
    savedPath: null,
  };
}

function report(files: DownloadedFile[], reportType: "daily" | "weekly" = "daily"): RawReport {
  return {
    request: {
      reportType,
      range: { from: "2026-10-20", to: "2026-10-20", label: "20 Oct (Tuesday)", preset: "tomorrow" },
    },
    files,
  };
}

const ARRIVALS = csv("arrivals", [
  "\uFEFF" + HEADER,
  '"101","2 Bed Apartment","2","1","0","14:00","Jane Citizen"',
  '"3-04","Studio","1","","","",""',
  '"Total arrivals:","","3","1","0","",""',
]);

const DEPARTURES = csv("departures", [
  HEADER,
  '"205","1 Bed Apartment","2","0","1","10:00","Sam Example"',
  '"Daily totals:","","2","0","1","",""',
]);

describe("parse", () => {
  test("maps data rows to records, arrivals before departures", () => {
    const records = parse(report([DEPARTURES, ARRIVALS]), "daily");

    expect(records).toEqual([
      {
        section: "arrivals",
        property: "101",
        roomType: "2 Bed Apartment",
        guestName: "Jane Citizen",
        guests: { adults: 2, children: 1, infants: 0 },
        guestCount: 3,
        checkIn: "14:00",
        checkOut: null,
      },
      {
        section: "arrivals",
        property: "3-04",
        roomType: "Studio",
        guestName: "Guest",
        guests: { adults: 1, children: 0, infants: 0 },
        guestCount: 1,
        checkIn: null,
        checkOut: null,
      },
      {
        section: "departures",
        property: "205",
        roomType: "1 Bed Apartment",
        guestName: "Sam Example",
        guests: { adults: 2, children: 0, infants: 1 },
        guestCount: 3,
        checkIn: null,
        checkOut: "10:00",
      },
    ]);
  });

  test("record count equals the number of data rows", () => {
    expect(parse(report([ARRIVALS, DEPARTURES]), "daily")).toHaveLength(3);
  });

  test("records are immutable", () => {
    const [first] = parse(report([ARRIVALS, DEPARTURES]), "daily");
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.guests)).toBe(true);
  });

  test("headers with no data rows give an empty result", () => {
    const records = parse(report([csv("arrivals", [HEADER]), csv("departures", [HEADER, '"Daily totals:","","0","0","0","",""'])]), "daily");
    expect(records).toEqual([]);
  });

  test("ignores pdf files", () => {
    const pdf: DownloadedFile = {
      section: "arrivals",
      format: "pdf",
      fileName: "arrivals_20261020.pdf",
      data: Buffer.from("%PDF-1.7"),
      savedPath: null,
    };
    expect(parse(report([pdf, ARRIVALS, DEPARTURES]), "daily")).toHaveLength(3);
  });

  test("is deterministic", () => {
    const raw = report([ARRIVALS, DEPARTURES]);
    expect(parse(raw, "daily")).toEqual(parse(raw, "daily"));
  });

  test("missing section CSV is a FormatError", () => {
    expect(() => parse(report([ARRIVALS]), "daily")).toThrow(
      new FormatError("No CSV export for departures in the daily report")
    );
  });

  test("missing expected columns is a FormatError", () => {
    const bad = csv("arrivals", ["Room,Guests", "101,2"]);
    expect(() => parse(report([bad, DEPARTURES]), "daily")).toThrow(
      "arrivals CSV is missing expected columns: textBox4, textBox6, textBox7, textBox8, textBox10"
    );
  });

  test("an empty payload is a FormatError, not an empty result", () => {
    const empty = csv("arrivals", []);
    expect(() => parse(report([empty, DEPARTURES]), "daily")).toThrow("arrivals CSV is empty (no header row)");
  });

  test("a non-numeric guest count is a FormatError with the line number", () => {
    const bad = csv("departures", [HEADER, '"205","","two","0","0","10:00",""']);
    expect(() => parse(report([ARRIVALS, bad]), "daily")).toThrow(
      'departures CSV line 2: textBox6 is not a whole number ("two")'
    );
  });

  test("report type mismatch is a FormatError", () => {
    expect(() => parse(report([ARRIVALS, DEPARTURES], "weekly"), "daily")).toThrow(FormatError);
  });
});

describe("isDataRow", () => {
  test("room identifiers start with a digit", () => {
    expect(isDataRow("101")).toBe(true);
    expect(isDataRow("3-04")).toBe(true);
    expect(isDataRow(" 12 B")).toBe(true);
  });

  test("labels and blanks are not data rows", () => {
    expect(isDataRow("Total arrivals:")).toBe(false);
    expect(isDataRow("Daily totals:")).toBe(false);
    expect(isDataRow("")).toBe(false);
  });
});
