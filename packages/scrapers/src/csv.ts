import type { LectureEvent } from "@ianuacal/core";

const COLUMNS = ["course", "subscription", "summary", "start_date", "end_date", "description", "location", "url"];

function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Events as CSV, one header line plus one line per event, CRLF-terminated. */
export function toCsv(events: readonly LectureEvent[]): string {
  const lines = [COLUMNS.join(",")];
  for (const ev of events) {
    lines.push(
      [ev.course, ev.subscription ?? "", ev.summary, ev.startDate, ev.endDate, ev.description, ev.location, ev.url]
        .map(escapeCsv)
        .join(","),
    );
  }
  return lines.join("\r\n") + "\r\n";
}
