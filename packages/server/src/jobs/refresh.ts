/**
 * Periodic re-scrape.
 *
 * A refresh scrapes everything, then swaps the result into the store in one
 * step. Failed or empty cycles leave the previous snapshot in place.
 */

import cron, { type ScheduledTask } from "node-cron";
import type { ScrapeResult } from "@ianuacal/core";
import type { Scraper } from "@ianuacal/scrapers";
import type { FeedStore } from "../store.js";

/** Run one scrape-and-replace cycle. Resolves to whether the store was updated. */
export async function refreshFeeds(store: FeedStore, scraper: Scraper): Promise<boolean> {
  const start = Date.now();

  let result: ScrapeResult;
  try {
    result = await scraper.scrape();
  } catch (err) {
    console.error(`[refresh] Update failed, keeping previous snapshot: ${err instanceof Error ? err.message : err}`);
    return false;
  }

  if (result.events.length === 0 && result.subscriptions.length === 0) {
    console.warn(`[refresh] ${scraper.name} returned nothing, keeping previous snapshot`);
    return false;
  }

  const snapshot = store.update(result.events, result.subscriptions);
  const elapsed = ((Date.now() - start) / 1000).toFixed(1);
  console.log(`[refresh] Updated with ${snapshot.events.length} events in ${snapshot.groups.size} subscriptions (${elapsed}s)`);
  return true;
}

export class RefreshJob {
  private running: Promise<boolean> | null = null;
  private task: ScheduledTask | null = null;

  constructor(
    private readonly store: FeedStore,
    private readonly scraper: Scraper,
  ) {}

  /** Start a refresh, or join the one already in flight. */
  run(): Promise<boolean> {
    if (this.running) {
      console.log(`[refresh] Previous refresh still running, joining it`);
      return this.running;
    }
    this.running = refreshFeeds(this.store, this.scraper).finally(() => {
      this.running = null;
    });
    return this.running;
  }

  start(schedule: string): void {
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid REFRESH_SCHEDULE: ${schedule}`);
    }
    this.task = cron.schedule(schedule, () => {
      console.log(`[refresh] Running scheduled refresh...`);
      this.run().catch((err) => console.error(`[refresh] Scheduled refresh failed:`, err));
    });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }
}
