import { describe, it, expect, vi, afterEach } from "vitest";
import {
  parseItalianDate,
  parseTimeRange,
  readLectures,
  composeDescription,
  toLectureEvent,
  type RawTableRow,
} from "../src/normalize.js";

const CALENDAR_URL = "https://ianua.unige.it/calendari-ISB-caratterizzanti-25-26";

function row(date: string, time: string, title: string, responsible = ""): RawTableRow {
  return { date, time, title, responsible, flyerHref: null };
}

describe("parseItalianDate", () => {
  it("parses day/month/year", () => {
    expect(parseItalianDate("12/10/2025")).toEqual({ year: 2025, month: 10, day: 12 });
    expect(parseItalianDate("1/9/2025")).toEqual({ year: 2025, month: 9, day: 1 });
  });

  it("rejects malformed and impossible dates", () => {
    expect(parseItalianDate("31/02/2025")).toBeNull();
    expect(parseItalianDate("2025-10-12")).toBeNull();
    expect(parseItalianDate("")).toBeNull();
  });
});

describe("parseTimeRange", () => {
  it("parses two HH:MM parts", () => {
    expect(parseTimeRange("09:00-11:00")).toEqual({ start: { hour: 9, minute: 0 }, end: { hour: 11, minute: 0 } });
    expect(parseTimeRange("9:00 - 11:30")).toEqual({ start: { hour: 9, minute: 0 }, end: { hour: 11, minute: 30 } });
  });

  it("rejects anything else", () => {
    expect(parseTimeRange("09:00")).toBeNull();
    expect(parseTimeRange("09:00-11:00-13:00")).toBeNull();
    expect(parseTimeRange("25:00-26:00")).toBeNull();
    expect(parseTimeRange("09.00-11.00")).toBeNull();
  });
});

describe("readLectures", () => {
  it("carries a date over blank date cells", () => {
    const lectures = readLectures([
      row("12/10/2025", "09:00-11:00", "A"),
      row("", "11:00-13:00", "B"),
      row("13/10/2025", "09:00-10:00", "C"),
      row("", "10:00-12:00", "D"),
    ]);
    expect(lectures.map((l) => [l.row.title, l.date.day])).toEqual([
      ["A", 12],
      ["B", 12],
      ["C", 13],
      ["D", 13],
    ]);
  });

  it("skips rows before the first date", () => {
    const lectures = readLectures([row("", "09:00-11:00", "X"), row("12/10/2025", "09:00-11:00", "A")]);
    expect(lectures.map((l) => l.row.title)).toEqual(["A"]);
  });

  it("skips a malformed date without losing the carried one", () => {
    const lectures = readLectures([
      row("12/10/2025", "09:00-11:00", "A"),
      row("32/10/2025", "11:00-13:00", "B"),
      row("", "14:00-16:00", "C"),
    ]);
    expect(lectures.map((l) => [l.row.title, l.date.day])).toEqual([
      ["A", 12],
      ["C", 12],
    ]);
  });

  it("skips rows without a title or a usable time", () => {
    const lectures = readLectures([
      row("12/10/2025", "09:00-11:00", ""),
      row("", "", "B"),
      row("", "mattina", "C"),
      row("", "14:00-16:00", "D"),
    ]);
    expect(lectures.map((l) => l.row.title)).toEqual(["D"]);
  });
});

describe("composeDescription", () => {
  it("joins responsible and speaker, defaulting to TBD", () => {
    expect(composeDescription("Mario Rossi", null)).toBe("Responsabile: Mario Rossi");
    expect(composeDescription("", "Prof. Anna Bianchi\nBio")).toBe("Speaker: Prof. Anna Bianchi\nBio");
    expect(composeDescription("Mario Rossi", "Prof. Anna Bianchi")).toBe(
      "Responsabile: Mario Rossi\nSpeaker: Prof. Anna Bianchi",
    );
    expect(composeDescription("", null)).toBe("TBD");
  });
});

describe("toLectureEvent", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const [lecture] = readLectures([row("12/10/2025", "09:00-11:00", "Farmacologia", "Mario Rossi")]);

  it("uses the flyer for location, speaker and url", () => {
    const event = toLectureEvent(lecture, {
      course: "ISB",
      subscription: "ISB Modulo A",
      calendarUrl: CALENDAR_URL,
      flyerUrl: "https://ianua.unige.it/files/locandina-1.pdf",
      flyer: { text: "…", location: "Aula Magna", speaker: "Prof. Anna Bianchi" },
    });

    expect(event).toEqual({
      course: "ISB",
      subscription: "ISB Modulo A",
      summary: "Farmacologia",
      startDate: "2025-10-12T09:00:00",
      endDate: "2025-10-12T11:00:00",
      description: "Responsabile: Mario Rossi\nSpeaker: Prof. Anna Bianchi",
      location: "Aula Magna",
      url: "https://ianua.unige.it/files/locandina-1.pdf",
    });
  });

  it("falls back to the calendar page without a flyer", () => {
    const event = toLectureEvent(lecture, {
      course: "ISB",
      subscription: "ISB Modulo A",
      calendarUrl: CALENDAR_URL,
      flyerUrl: null,
      flyer: null,
    });

    expect(event.location).toBe("");
    expect(event.url).toBe(CALENDAR_URL);
    expect(event.description).toBe("Responsabile: Mario Rossi");
  });

  it("passes an inverted range through with a warning", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const [overnight] = readLectures([row("12/10/2025", "22:00-01:00", "Notturno")]);

    const event = toLectureEvent(overnight, {
      course: "ISB",
      subscription: "ISB Modulo A",
      calendarUrl: CALENDAR_URL,
      flyerUrl: null,
      flyer: null,
    });

    expect(event.startDate).toBe("2025-10-12T22:00:00");
    expect(event.endDate).toBe("2025-10-12T01:00:00");
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
