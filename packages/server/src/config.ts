/**
 * Server configuration, read from environment variables:
 *   APP_NAME          — prefix of every feed name (default: IANUA)
 *   HOST, PORT        — bind address (default: 0.0.0.0:8000)
 *   REFRESH_SCHEDULE  — cron expression for re-scraping (default: hourly)
 * plus the scraper variables documented in @ianuacal/scrapers.
 */

import { loadScraperConfig, positiveInt, type ScraperConfig } from "@ianuacal/scrapers";

export interface ServerConfig {
  appName: string;
  host: string;
  port: number;
  refreshSchedule: string;
  scraper: ScraperConfig;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    appName: env.APP_NAME?.trim() || "IANUA",
    host: env.HOST?.trim() || "0.0.0.0",
    port: positiveInt(env.PORT, 8000),
    refreshSchedule: env.REFRESH_SCHEDULE?.trim() || "0 * * * *",
    scraper: loadScraperConfig(env),
  };
}
