/**
 * Hono application: feed routes plus a health check.
 */

import { Hono } from "hono";
import type { FeedStore } from "./store.js";
import { feedRoutes } from "./routes/feeds.js";

export interface AppOptions {
  appName: string;
}

export function createApp(store: FeedStore, options: AppOptions): Hono {
  const app = new Hono();

  app.get("/healthz", (c) => {
    const snapshot = store.current();
    return c.json({
      status: "ok",
      events: snapshot.events.length,
      subscriptions: snapshot.groups.size,
      updatedAt: snapshot.updatedAt,
    });
  });

  app.route("/", feedRoutes(store, options.appName));

  return app;
}
