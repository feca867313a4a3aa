/**
 * In-memory feed state.
 *
 * The whole event set lives in one frozen FeedSnapshot. A refresh builds the
 * next snapshot off to the side and swaps the reference in a single
 * assignment, so a request that reads `current()` once works on a consistent
 * set for its whole lifetime.
 */

import { createFeedSnapshot, type FeedSnapshot, type LectureEvent } from "@ianuacal/core";

export class FeedStore {
  private snapshot: FeedSnapshot;

  constructor(initial: FeedSnapshot = createFeedSnapshot([], [], null)) {
    this.snapshot = initial;
  }

  current(): FeedSnapshot {
    return this.snapshot;
  }

  /** Replace every event and the derived grouping at once. */
  update(events: readonly LectureEvent[], subscriptions: readonly string[] = []): FeedSnapshot {
    const next = createFeedSnapshot(events, subscriptions);
    this.snapshot = next;
    return next;
  }
}
