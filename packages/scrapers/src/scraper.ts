/**
 * Scraper interface — each calendar source implements this.
 */

import type { ScrapeResult } from "@ianuacal/core";

export interface Scraper {
  /** Unique slug for this scraper, e.g. "ianua" */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** The source URL being scraped */
  readonly url: string;

  /** Fetch and parse events from the source. Never rejects for a single bad page or row. */
  scrape(): Promise<ScrapeResult>;
}
