/**
 * Core lecture event model.
 *
 * Field naming follows iCalendar where possible. Timestamps are naive local
 * time: the upstream calendars carry no zone and feeds are published as
 * floating times.
 */

/** Label used for events that carry no subscription. */
export const UNKNOWN_SUBSCRIPTION = "unknown";

/** Description used when neither a responsible person nor a speaker is known. */
export const DEFAULT_DESCRIPTION = "TBD";

/** Naive local timestamp, `YYYY-MM-DDTHH:MM:SS` with no zone designator. */
export type LocalDateTime = string;

/**
 * The canonical lecture event.
 */
export interface LectureEvent {
  /** Course code the calendar page belongs to, e.g. "ISB". */
  course: string;

  /** Calendar section heading the event was listed under. */
  subscription?: string;

  /** Lecture title (iCal SUMMARY). */
  summary: string;

  startDate: LocalDateTime;
  endDate: LocalDateTime;

  /** Multi-line, never empty: falls back to DEFAULT_DESCRIPTION. */
  description: string;

  /** Room / building, possibly empty. */
  location: string;

  /** Flyer URL when the lecture has one, else the calendar page. */
  url: string;
}

/** Text recovered from a lecture flyer. Each field fails independently. */
export interface FlyerExtract {
  text: string | null;
  location: string | null;
  speaker: string | null;
}

/** Events plus every subscription heading seen while producing them. */
export interface ScrapeResult {
  events: LectureEvent[];
  subscriptions: string[];
}

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/** Check whether a string is a well-formed LocalDateTime. */
export function isLocalDateTime(value: unknown): value is LocalDateTime {
  return typeof value === "string" && LOCAL_DATE_TIME.test(value);
}

/** Combine calendar parts into a LocalDateTime. */
export function toLocalDateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
): LocalDateTime {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:00`;
}
