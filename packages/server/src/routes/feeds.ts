/**
 * Feed routes — iCal endpoints and the subscription index.
 *
 * GET /calendar.ics        — every event
 * GET /calendar/:slug.ics  — one subscription
 * GET /calendars           — HTML list of subscribable feeds
 */

import { Hono, type Context } from "hono";
import { html } from "hono/html";
import { findSubscription, renderCalendar, type LectureEvent } from "@ianuacal/core";
import type { FeedStore } from "../store.js";

export function feedRoutes(store: FeedStore, appName: string): Hono {
  const router = new Hono();

  router.get("/calendar.ics", (c) => {
    const snapshot = store.current();
    return calendarResponse(c, snapshot.events, `${appName} Full Calendar`);
  });

  router.get("/calendar/:file", (c) => {
    const snapshot = store.current();
    const match = c.req.param("file").match(/^(.+)\.ics$/);
    const label = match ? findSubscription(snapshot, match[1]) : undefined;
    if (label === undefined) return c.text("Subscription not found", 404);

    return calendarResponse(c, snapshot.groups.get(label) ?? [], `${appName} ${label}`);
  });

  router.get("/calendars", (c) => {
    // only labels that own a slug have a feed of their own
    const feeds = [...store.current().slugs].sort(([, a], [, b]) => (a < b ? -1 : a > b ? 1 : 0));
    return c.html(html`<h1>${appName} Calendar Subscriptions</h1><ul><li><a href="/calendar.ics">Full Calendar (All Events)</a></li>${feeds.map(
      ([slug, label]) => html`<li><a href="/calendar/${slug}.ics">${label}</a></li>`,
    )}</ul>`);
  });

  return router;
}

function calendarResponse(c: Context, events: readonly LectureEvent[], name: string): Response {
  return c.body(renderCalendar(events, name), 200, {
    "Content-Type": "text/calendar; charset=utf-8",
    "Content-Disposition": contentDisposition(`${name.replace(/ /g, "_")}.ics`),
  });
}

/**
 * `attachment; filename="…"`, with an RFC 6266 `filename*` added when the
 * name is not plain ASCII (header values must be Latin-1).
 */
export function contentDisposition(filename: string): string {
  if (/^[\x20-\x7e]*$/.test(filename) && !/["\\]/.test(filename)) {
    return `attachment; filename="${filename}"`;
  }
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeRfc5987(filename)}`;
}

function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(/['()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`);
}
