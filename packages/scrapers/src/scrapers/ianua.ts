/**
 * Scraper for the IANUA lecture calendars (ianua.unige.it).
 *
 * The landing page links one calendar page per course
 * ("calendari-ISB-caratterizzanti-25-26"). Each calendar page has an <h2>
 * per module group, prefixed with the course code, followed by a table:
 *
 *   date | - | time | - | title | - | responsible | - | details (flyer link)
 *
 * Date cells span several rows upstream, so a blank date repeats the last
 * one seen in the same table.
 */

import * as cheerio from "cheerio";
import type { FlyerExtract, LectureEvent, ScrapeResult } from "@ianuacal/core";
import type { Scraper } from "../scraper.js";
import { type ScraperConfig, loadScraperConfig } from "../config.js";
import { fetchText } from "../fetch.js";
import { FlyerExtractor } from "../flyer.js";
import { mapConcurrent } from "../concurrency.js";
import { type RawTableRow, readLectures, toLectureEvent } from "../normalize.js";

/** A calendar page found on the landing page. */
export interface RawCalendarLink {
  course: string;
  url: string;
  title: string;
}

/** One course heading and the rows of the table that follows it. */
export interface CalendarSection {
  subscription: string;
  rows: RawTableRow[];
}

export interface FlyerSource {
  extract(flyerUrl: string): Promise<FlyerExtract>;
}

export interface IanuaScraperOptions extends Partial<ScraperConfig> {
  flyers?: FlyerSource;
}

const MIN_CELLS = 9;

export class IanuaScraper implements Scraper {
  readonly id = "ianua";
  readonly name = "IANUA caratterizzanti";
  readonly url: string;

  private readonly marker: string;
  private readonly timeoutMs: number;
  private readonly flyerConcurrency: number;
  private readonly flyers: FlyerSource;

  constructor(options: IanuaScraperOptions = {}) {
    const defaults = loadScraperConfig();
    this.url = options.landingUrl ?? defaults.landingUrl;
    this.marker = options.calendarMarker ?? defaults.calendarMarker;
    this.timeoutMs = options.fetchTimeoutMs ?? defaults.fetchTimeoutMs;
    this.flyerConcurrency = options.flyerConcurrency ?? defaults.flyerConcurrency;
    this.flyers = options.flyers ?? new FlyerExtractor({ timeoutMs: this.timeoutMs });
  }

  /** Discover every course calendar, then scrape them one after another. */
  async scrape(): Promise<ScrapeResult> {
    const calendars = await this.discoverCalendars(this.url);
    const events: LectureEvent[] = [];
    const subscriptions: string[] = [];

    for (const calendar of calendars) {
      const result = await this.scrapeCalendar(calendar.url, calendar.course);
      console.log(`[scrapers] ${calendar.course}: ${result.events.length} events in ${result.subscriptions.length} subscriptions`);
      events.push(...result.events);
      subscriptions.push(...result.subscriptions);
    }

    return { events, subscriptions };
  }

  async discoverCalendars(landingUrl: string = this.url): Promise<RawCalendarLink[]> {
    let html: string;
    try {
      html = await fetchText(landingUrl, this.timeoutMs);
    } catch (err) {
      console.error(`[scrapers] Error scraping ${landingUrl}: ${err instanceof Error ? err.message : err}`);
      return [];
    }
    return parseCalendarLinks(html, landingUrl, this.marker);
  }

  async scrapeCalendar(calendarUrl: string, course: string): Promise<ScrapeResult> {
    let html: string;
    try {
      html = await fetchText(calendarUrl, this.timeoutMs);
    } catch (err) {
      console.error(`[scrapers] Error scraping calendar ${calendarUrl}: ${err instanceof Error ? err.message : err}`);
      return { events: [], subscriptions: [] };
    }

    const sections = parseCalendarPage(html, course);
    const events: LectureEvent[] = [];

    for (const section of sections) {
      const lectures = readLectures(section.rows);
      const built = await mapConcurrent(lectures, this.flyerConcurrency, async (lecture) => {
        const flyerUrl = lecture.row.flyerHref ? resolveUrl(lecture.row.flyerHref, calendarUrl) : null;
        const flyer = flyerUrl ? await this.flyers.extract(flyerUrl) : null;
        return toLectureEvent(lecture, {
          course,
          subscription: section.subscription,
          calendarUrl,
          flyerUrl,
          flyer,
        });
      });
      events.push(...built);
    }

    return { events, subscriptions: sections.map((s) => s.subscription) };
  }
}

/**
 * Calendar links on the landing page. The course code is the second
 * dash-separated segment of the href.
 */
export function parseCalendarLinks(html: string, landingUrl: string, marker: string): RawCalendarLink[] {
  const $ = cheerio.load(html);
  const origin = new URL(landingUrl).origin;
  const links: RawCalendarLink[] = [];

  $("a[href]").each((_i, el) => {
    const $a = $(el);
    const href = $a.attr("href");
    if (!href || !href.includes(marker)) return;

    const url = resolveUrl(href, origin);
    if (!url) return;

    links.push({
      course: href.split("-")[1] ?? "",
      url,
      title: cleanText($a.text()),
    });
  });

  return links;
}

/**
 * Every <h2> starting with `course + " "` and the rows of the first table
 * after it in document order (header row skipped, short rows dropped).
 */
export function parseCalendarPage(html: string, course: string): CalendarSection[] {
  const $ = cheerio.load(html);
  const nodes = $("h2, table").toArray();
  const sections: CalendarSection[] = [];

  nodes.forEach((node, index) => {
    const $node = $(node);
    if (!$node.is("h2")) return;

    const title = cleanText($node.text());
    if (!title.startsWith(`${course} `)) return;

    const table = nodes.slice(index + 1).find((candidate) => $(candidate).is("table"));
    const rows: RawTableRow[] = [];

    if (table) {
      $(table)
        .find("tr")
        .slice(1)
        .each((_i, tr) => {
          const cells = $(tr).find("td");
          if (cells.length < MIN_CELLS) return;

          const details = cells.eq(8);
          rows.push({
            date: cleanText(cells.eq(0).text()),
            time: cleanText(cells.eq(2).text()),
            title: cleanText(cells.eq(4).text()),
            responsible: cleanText(cells.eq(6).text()),
            flyerHref: details.find("a").first().attr("href")?.trim() || null,
          });
        });
    }

    sections.push({ subscription: title, rows });
  });

  return sections;
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}
