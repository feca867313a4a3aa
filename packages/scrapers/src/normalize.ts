/**
 * Map scraped table cells and flyer fields onto the canonical LectureEvent.
 */

import {
  DEFAULT_DESCRIPTION,
  toLocalDateTime,
  type FlyerExtract,
  type LectureEvent,
} from "@ianuacal/core";

/** One lecture row as it appears in the calendar table. */
export interface RawTableRow {
  /** cell 0, `DD/MM/YYYY`, empty when the date carries over from the row above */
  date: string;
  /** cell 2, `HH:MM-HH:MM` */
  time: string;
  /** cell 4 */
  title: string;
  /** cell 6 */
  responsible: string;
  /** href of the first link in cell 8 */
  flyerHref: string | null;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface TimeRange {
  start: ClockTime;
  end: ClockTime;
}

/** A row that passed date carry-over and time parsing. */
export interface Lecture {
  row: RawTableRow;
  date: CalendarDate;
  times: TimeRange;
}

/** Parse `DD/MM/YYYY` (one-digit day and month accepted). Null for impossible dates. */
export function parseItalianDate(text: string): CalendarDate | null {
  const m = text.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!m) return null;

  const day = parseInt(m[1], 10);
  const month = parseInt(m[2], 10);
  const year = parseInt(m[3], 10);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

export function parseClockTime(text: string): ClockTime | null {
  const m = text.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!m) return null;
  const hour = parseInt(m[1], 10);
  const minute = parseInt(m[2], 10);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

/** Parse `HH:MM-HH:MM`; anything other than exactly two valid parts is rejected. */
export function parseTimeRange(text: string): TimeRange | null {
  const parts = text.split("-");
  if (parts.length !== 2) return null;
  const start = parseClockTime(parts[0]);
  const end = parseClockTime(parts[1]);
  if (!start || !end) return null;
  return { start, end };
}

/**
 * Apply the date carry-over rule to the rows of one table and drop rows that
 * cannot become events. A malformed date skips its row and leaves the
 * carried date untouched.
 */
export function readLectures(rows: readonly RawTableRow[]): Lecture[] {
  const lectures: Lecture[] = [];
  let currentDate: CalendarDate | null = null;

  for (const row of rows) {
    if (row.date) {
      const parsed = parseItalianDate(row.date);
      if (!parsed) continue;
      currentDate = parsed;
    }

    if (!currentDate || !row.time || !row.title) continue;

    const times = parseTimeRange(row.time);
    if (!times) continue;

    lectures.push({ row, date: currentDate, times });
  }

  return lectures;
}

export function composeDescription(responsible: string, speaker: string | null): string {
  const parts: string[] = [];
  if (responsible) parts.push(`Responsabile: ${responsible}`);
  if (speaker) parts.push(`Speaker: ${speaker}`);
  return parts.length > 0 ? parts.join("\n") : DEFAULT_DESCRIPTION;
}

export interface LectureContext {
  course: string;
  subscription: string;
  calendarUrl: string;
  /** Absolute flyer URL, when the row links one. */
  flyerUrl: string | null;
  flyer: FlyerExtract | null;
}

export function toLectureEvent(lecture: Lecture, context: LectureContext): LectureEvent {
  const { date, times, row } = lecture;
  const startDate = toLocalDateTime(date.year, date.month, date.day, times.start.hour, times.start.minute);
  const endDate = toLocalDateTime(date.year, date.month, date.day, times.end.hour, times.end.minute);

  // Overnight or inverted ranges are published as listed upstream.
  if (startDate > endDate) {
    console.warn(`[scrapers] "${row.title}" ends before it starts (${row.time}), keeping as listed`);
  }

  return {
    course: context.course,
    subscription: context.subscription,
    summary: row.title,
    startDate,
    endDate,
    description: composeDescription(row.responsible, context.flyer?.speaker ?? null),
    location: context.flyer?.location ?? "",
    url: context.flyerUrl ?? context.calendarUrl,
  };
}
