/**
 * @ianuacal/core — shared types and helpers for the IANUA calendar feeds.
 */

export {
  type LectureEvent,
  type LocalDateTime,
  type FlyerExtract,
  type ScrapeResult,
  UNKNOWN_SUBSCRIPTION,
  DEFAULT_DESCRIPTION,
  isLocalDateTime,
  toLocalDateTime,
} from "./event.js";
export {
  toICal,
  fromICal,
  renderCalendar,
  parseCalendar,
  calendarName,
  eventUid,
  PRODUCT_ID,
  type ParsedEvent,
} from "./ical.js";
export { slugify } from "./slug.js";
export {
  groupBySubscription,
  createFeedSnapshot,
  findSubscription,
  type FeedSnapshot,
} from "./feed.js";
