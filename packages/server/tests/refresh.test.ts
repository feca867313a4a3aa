import { describe, it, expect, vi, afterEach } from "vitest";
import type { LectureEvent, ScrapeResult } from "@ianuacal/core";
import { FeedStore } from "../src/store.js";
import { RefreshJob, refreshFeeds } from "../src/jobs/refresh.js";

const LECTURE: LectureEvent = {
  course: "ISB",
  subscription: "ISB Modulo A",
  summary: "Farmacologia",
  startDate: "2025-10-12T09:00:00",
  endDate: "2025-10-12T11:00:00",
  description: "TBD",
  location: "",
  url: "https://ianua.unige.it/calendari-ISB-caratterizzanti-25-26",
};

function fakeScraper(scrape: () => Promise<ScrapeResult>) {
  return { id: "fake", name: "Fake", url: "https://example.test", scrape: vi.fn(scrape) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("refreshFeeds", () => {
  it("replaces the snapshot with the scrape result", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const store = new FeedStore();

    const scraper = fakeScraper(async () => ({ events: [LECTURE], subscriptions: ["ISB Modulo A", "ISB Seminari"] }));

    const updated = await refreshFeeds(store, scraper);

    expect(updated).toBe(true);
    expect(store.current().events).toEqual([LECTURE]);
    expect([...store.current().groups.keys()]).toEqual(["ISB Modulo A", "ISB Seminari"]);
  });

  it("keeps the previous snapshot when the scrape throws", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const store = new FeedStore();
    const previous = store.update([LECTURE], ["ISB Modulo A"]);

    const updated = await refreshFeeds(store, fakeScraper(async () => {
      throw new Error("boom");
    }));

    expect(updated).toBe(false);
    expect(store.current()).toBe(previous);
    expect(errorSpy).toHaveBeenCalledWith("[refresh] Update failed, keeping previous snapshot: boom");
  });

  it("keeps the previous snapshot when nothing was discovered", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const store = new FeedStore();
    const previous = store.update([LECTURE], ["ISB Modulo A"]);

    const updated = await refreshFeeds(store, fakeScraper(async () => ({ events: [], subscriptions: [] })));

    expect(updated).toBe(false);
    expect(store.current()).toBe(previous);
  });

  it("applies a result with subscriptions but no lectures", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const store = new FeedStore();
    store.update([LECTURE], ["ISB Modulo A"]);

    const updated = await refreshFeeds(store, fakeScraper(async () => ({ events: [], subscriptions: ["ISB Modulo A"] })));

    expect(updated).toBe(true);
    expect(store.current().events).toEqual([]);
  });
});

describe("RefreshJob", () => {
  it("does not overlap refreshes", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    let release: (result: ScrapeResult) => void = () => {};
    const scraper = fakeScraper(
      () =>
        new Promise<ScrapeResult>((resolve) => {
          release = resolve;
        }),
    );
    const job = new RefreshJob(new FeedStore(), scraper);

    const first = job.run();
    const second = job.run();
    release({ events: [LECTURE], subscriptions: ["ISB Modulo A"] });

    expect(await first).toBe(true);
    expect(await second).toBe(true);
    expect(scraper.scrape).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith("[refresh] Previous refresh still running, joining it");

    const third = job.run();
    release({ events: [LECTURE], subscriptions: ["ISB Modulo A"] });
    expect(await third).toBe(true);
    expect(scraper.scrape).toHaveBeenCalledTimes(2);
  });

  it("rejects an invalid schedule", () => {
    const job = new RefreshJob(new FeedStore(), fakeScraper(async () => ({ events: [], subscriptions: [] })));
    expect(() => job.start("every hour")).toThrow("Invalid REFRESH_SCHEDULE: every hour");
  });
});
