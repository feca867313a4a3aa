/**
 * Scraper configuration, read from environment variables:
 *   LANDING_URL        — page listing the per-course calendars
 *   CALENDAR_MARKER    — substring identifying calendar links on the landing page
 *   FETCH_TIMEOUT_MS   — per-request timeout (default: 30000)
 *   FLYER_CONCURRENCY  — flyer downloads in flight per calendar (default: 1)
 */

export const DEFAULT_LANDING_URL = "https://ianua.unige.it/calendari-lezioni-2025-2026";
export const DEFAULT_CALENDAR_MARKER = "caratterizzanti-25-26";

export interface ScraperConfig {
  landingUrl: string;
  calendarMarker: string;
  fetchTimeoutMs: number;
  flyerConcurrency: number;
}

export function loadScraperConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  return {
    landingUrl: env.LANDING_URL?.trim() || DEFAULT_LANDING_URL,
    calendarMarker: env.CALENDAR_MARKER?.trim() || DEFAULT_CALENDAR_MARKER,
    fetchTimeoutMs: positiveInt(env.FETCH_TIMEOUT_MS, 30_000),
    flyerConcurrency: positiveInt(env.FLYER_CONCURRENCY, 1),
  };
}

export function positiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || "", 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}
