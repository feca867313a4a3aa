#!/usr/bin/env node
/**
 * IANUA scraper CLI
 *
 * Usage:
 *   npm run scrape --                                   # scrape every calendar, print JSON
 *   npm run scrape -- --list                            # list calendars found on the landing page
 *   npm run scrape -- --csv                             # print events as CSV
 *   npm run scrape -- --calendar URL --course CODE      # scrape a single calendar page
 *
 * Progress goes to stderr so stdout can be redirected to a file.
 */

import { config } from "dotenv";

config();

import type { ScrapeResult } from "@ianuacal/core";
import { loadScraperConfig } from "./config.js";
import { IanuaScraper } from "./scrapers/ianua.js";
import { toCsv } from "./csv.js";

function flagValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    console.log(`Usage: npm run scrape -- [options]

Options:
  --list, -l                List calendars found on the landing page
  --csv                     Print events as CSV instead of JSON
  --calendar URL            Scrape a single calendar page (requires --course)
  --course CODE             Course code of --calendar, e.g. ISB
  --help, -h                Show this help

Environment: LANDING_URL, CALENDAR_MARKER, FETCH_TIMEOUT_MS, FLYER_CONCURRENCY`);
    return;
  }

  const scraper = new IanuaScraper(loadScraperConfig());

  if (args.includes("--list") || args.includes("-l")) {
    const calendars = await scraper.discoverCalendars();
    console.log(`Calendars on ${scraper.url}:\n`);
    for (const c of calendars) {
      console.log(`  ${c.course.padEnd(10)} ${c.title} (${c.url})`);
    }
    return;
  }

  const calendarUrl = flagValue(args, "--calendar");
  const course = flagValue(args, "--course");
  if (calendarUrl && !course) {
    console.error("Error: --course is required when using --calendar");
    process.exit(1);
  }

  const start = Date.now();
  console.error(`🔍 Scraping ${calendarUrl ?? scraper.url}…`);

  let result: ScrapeResult;
  if (calendarUrl && course) {
    result = await scraper.scrapeCalendar(calendarUrl, course);
  } else {
    result = await scraper.scrape();
  }

  const elapsed = ((Date.now() - start) / 1000).toFixed(1);
  console.error(`   Done: ${result.events.length} events in ${result.subscriptions.length} subscriptions in ${elapsed}s\n`);

  if (args.includes("--csv")) {
    process.stdout.write(toCsv(result.events));
  } else {
    console.log(JSON.stringify(result, null, 2));
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
