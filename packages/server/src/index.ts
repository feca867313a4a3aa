/**
 * IANUA calendar server — entry point.
 *
 * Serves the scraped lecture calendars as iCal feeds and re-scrapes them on
 * startup and on a cron schedule.
 */

import { config } from "dotenv";
// .env in the working directory: the repo root under `npm start`
config();
import { serve } from "@hono/node-server";
import { IanuaScraper } from "@ianuacal/scrapers";
import { loadServerConfig } from "./config.js";
import { FeedStore } from "./store.js";
import { createApp } from "./app.js";
import { RefreshJob } from "./jobs/refresh.js";

const settings = loadServerConfig();
const store = new FeedStore();
const app = createApp(store, { appName: settings.appName });
const job = new RefreshJob(store, new IanuaScraper(settings.scraper));

console.log(`🗓️  ${settings.appName} calendar server starting on http://${settings.host}:${settings.port}`);
console.log(`   Full calendar: http://${settings.host}:${settings.port}/calendar.ics`);

const server = serve({ fetch: app.fetch, hostname: settings.host, port: settings.port });

// Feeds are empty until the first scrape completes
job.run().catch((err) => console.error(`[refresh] Initial refresh failed:`, err));
job.start(settings.refreshSchedule);

function shutdown(): void {
  console.log(`[server] Shutting down`);
  job.stop();
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
