/**
 * Convert between lecture events and iCalendar documents.
 *
 * Times are written in floating form (no TZID, no trailing Z): the upstream
 * calendars are naive local time and subscribers render them as such.
 */

import { createHash } from "node:crypto";
import { type LectureEvent, type LocalDateTime, UNKNOWN_SUBSCRIPTION, isLocalDateTime } from "./event.js";

export const PRODUCT_ID = "-//IANUACalDav//";

const MAX_LINE_OCTETS = 75;
const encoder = new TextEncoder();

/** Produce a VEVENT string (without the VCALENDAR wrapper). */
export function toICal(event: LectureEvent): string {
  const lines: string[] = [
    "BEGIN:VEVENT",
    `UID:${eventUid(event)}`,
    `SUMMARY:${escapeICalText(event.summary)}`,
    `DTSTART:${toICalDate(event.startDate)}`,
    `DTEND:${toICalDate(event.endDate)}`,
  ];

  if (event.description) lines.push(`DESCRIPTION:${escapeICalText(event.description)}`);
  if (event.location) lines.push(`LOCATION:${escapeICalText(event.location)}`);
  if (event.url) lines.push(`URL:${event.url}`);
  lines.push("END:VEVENT");

  return lines.map(foldLine).join("\r\n");
}

/** Render a complete VCALENDAR document named `name`. */
export function renderCalendar(events: readonly LectureEvent[], name: string): string {
  const header = [
    "BEGIN:VCALENDAR",
    `PRODID:${PRODUCT_ID}`,
    "VERSION:2.0",
    `NAME:${escapeICalText(name)}`,
    `X-WR-CALNAME:${escapeICalText(name)}`,
  ].map(foldLine);

  return [...header, ...events.map(toICal), "END:VCALENDAR", ""].join("\r\n");
}

/** Fields recovered from one VEVENT. */
export interface ParsedEvent {
  uid?: string;
  summary?: string;
  startDate?: LocalDateTime;
  endDate?: LocalDateTime;
  description?: string;
  location?: string;
  url?: string;
}

/** Parse a VEVENT string back into its event fields. */
export function fromICal(vevent: string): ParsedEvent {
  const props = parseProperties(vevent);

  return {
    uid: props["UID"],
    summary: props["SUMMARY"] !== undefined ? unescapeICalText(props["SUMMARY"]) : undefined,
    startDate: props["DTSTART"] !== undefined ? fromICalDate(props["DTSTART"]) : undefined,
    endDate: props["DTEND"] !== undefined ? fromICalDate(props["DTEND"]) : undefined,
    description: props["DESCRIPTION"] !== undefined ? unescapeICalText(props["DESCRIPTION"]) : undefined,
    location: props["LOCATION"] !== undefined ? unescapeICalText(props["LOCATION"]) : undefined,
    url: props["URL"],
  };
}

/** Parse every VEVENT of a VCALENDAR document, in document order. */
export function parseCalendar(document: string): ParsedEvent[] {
  const events: ParsedEvent[] = [];
  let block: string[] | null = null;

  // Component delimiters only count as whole content lines
  for (const line of unfold(document).split(/\r?\n/)) {
    if (line === "BEGIN:VEVENT") {
      block = [];
    } else if (line === "END:VEVENT") {
      if (block) events.push(fromICal(block.join("\r\n")));
      block = null;
    } else if (block) {
      block.push(line);
    }
  }

  return events;
}

/** Read the NAME (or X-WR-CALNAME) of a VCALENDAR document. */
export function calendarName(document: string): string | undefined {
  const lines = unfold(document).split(/\r?\n/);
  const firstEvent = lines.indexOf("BEGIN:VEVENT");
  const props = parseProperties((firstEvent >= 0 ? lines.slice(0, firstEvent) : lines).join("\r\n"));
  const name = props["NAME"] ?? props["X-WR-CALNAME"];
  return name !== undefined ? unescapeICalText(name) : undefined;
}

/**
 * Stable identifier for an event: the same lecture keeps its UID across
 * refreshes so subscribed clients update instead of duplicating it.
 */
export function eventUid(event: LectureEvent): string {
  const key = [event.subscription ?? UNKNOWN_SUBSCRIPTION, event.startDate, event.summary].join("\u0000");
  return `${createHash("sha1").update(key).digest("hex")}@ianuacal`;
}

// ---- helpers ----

function unfold(text: string): string {
  // RFC 5545 §3.1
  return text.replace(/\r?\n[ \t]/g, "");
}

function parseProperties(vevent: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of unfold(vevent).split(/\r?\n/)) {
    const colonIdx = line.indexOf(":");
    if (colonIdx < 1) continue;
    const rawKey = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1);

    if (!(rawKey in result)) result[rawKey] = value;

    // Also store under the base property name so "DTSTART;VALUE=..." is found as "DTSTART"
    const semiIdx = rawKey.indexOf(";");
    if (semiIdx > 0) {
      const baseName = rawKey.slice(0, semiIdx);
      if (!(baseName in result)) result[baseName] = value;
    }
  }
  return result;
}

/** Fold a content line at 75 octets without splitting a UTF-8 sequence. */
function foldLine(line: string): string {
  if (encoder.encode(line).length <= MAX_LINE_OCTETS) return line;

  const parts: string[] = [];
  let current = "";
  let size = 0;
  // continuation lines lose one octet to the leading space
  let limit = MAX_LINE_OCTETS;
  for (const char of line) {
    const charSize = encoder.encode(char).length;
    if (size + charSize > limit) {
      parts.push(current);
      current = "";
      size = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    size += charSize;
  }
  parts.push(current);
  return parts.join("\r\n ");
}

function escapeICalText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\n/g, "\\n");
}

function unescapeICalText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_m, ch: string) => (ch === "n" || ch === "N" ? "\n" : ch));
}

function toICalDate(local: string): string {
  // 2025-10-12T09:00:00 -> 20251012T090000
  return local.replace(/[-:]/g, "");
}

/** Floating date-time to LocalDateTime; undefined for UTC or date-only values. */
function fromICalDate(ical: string): LocalDateTime | undefined {
  // 20251012T090000 -> 2025-10-12T09:00:00
  const local = ical.replace(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/, "$1-$2-$3T$4:$5:$6");
  return isLocalDateTime(local) ? local : undefined;
}
