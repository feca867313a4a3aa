/**
 * Subscription grouping and the immutable feed snapshot served to readers.
 */

import { type LectureEvent, UNKNOWN_SUBSCRIPTION } from "./event.js";
import { slugify } from "./slug.js";

/** Everything a feed request needs, built once per refresh and never mutated. */
export interface FeedSnapshot {
  readonly events: readonly LectureEvent[];
  /** label → events, in first-seen order */
  readonly groups: ReadonlyMap<string, readonly LectureEvent[]>;
  /** slug → label; the first label wins when two labels share a slug, labels with an empty slug are left out */
  readonly slugs: ReadonlyMap<string, string>;
  /** ISO 8601, or null for the initial empty snapshot */
  readonly updatedAt: string | null;
}

/**
 * Group events by subscription label. Labels listed in `labels` are kept even
 * when no event references them.
 */
export function groupBySubscription(
  events: readonly LectureEvent[],
  labels: readonly string[] = [],
): Map<string, LectureEvent[]> {
  const groups = new Map<string, LectureEvent[]>();
  for (const label of labels) {
    if (!groups.has(label)) groups.set(label, []);
  }
  for (const event of events) {
    const label = event.subscription || UNKNOWN_SUBSCRIPTION;
    const group = groups.get(label);
    if (group) group.push(event);
    else groups.set(label, [event]);
  }
  return groups;
}

export function createFeedSnapshot(
  events: readonly LectureEvent[],
  labels: readonly string[] = [],
  updatedAt: string | null = new Date().toISOString(),
): FeedSnapshot {
  const groups = groupBySubscription(events, labels);

  const slugs = new Map<string, string>();
  for (const label of groups.keys()) {
    const slug = slugify(label);
    if (slug && !slugs.has(slug)) slugs.set(slug, label);
  }

  return Object.freeze({
    events: Object.freeze([...events]),
    groups,
    slugs,
    updatedAt,
  });
}

/** Resolve a slug from a request path, accepting the raw or percent-decoded form. */
export function findSubscription(snapshot: FeedSnapshot, slug: string): string | undefined {
  const direct = snapshot.slugs.get(slug);
  if (direct !== undefined) return direct;
  for (const [candidate, label] of snapshot.slugs) {
    if (safeDecode(candidate) === slug) return label;
  }
  return undefined;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
