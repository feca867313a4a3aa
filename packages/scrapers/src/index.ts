export type { Scraper } from "./scraper.js";
export { IanuaScraper, parseCalendarLinks, parseCalendarPage } from "./scrapers/ianua.js";
export type { RawCalendarLink, CalendarSection, FlyerSource, IanuaScraperOptions } from "./scrapers/ianua.js";
export { FlyerExtractor, extractLocation, extractSpeaker, joinPages, joinTextItems, readPdfText } from "./flyer.js";
export type { PdfTextItem } from "./flyer.js";
export {
  readLectures,
  toLectureEvent,
  parseItalianDate,
  parseTimeRange,
  composeDescription,
} from "./normalize.js";
export type { RawTableRow, Lecture, LectureContext } from "./normalize.js";
export { loadScraperConfig, positiveInt, type ScraperConfig } from "./config.js";
export { mapConcurrent } from "./concurrency.js";
export { toCsv } from "./csv.js";
