/**
 * URL-safe identifiers for subscription feeds.
 */

/**
 * Turn a subscription label into the slug used in `/calendar/<slug>.ics`.
 *
 * Parenthesized groups (usually a year or a cohort note) are dropped so the
 * slug survives cosmetic changes to the heading.
 */
export function slugify(label: string): string {
  const clean = label.replace(/\s*\([^)]*\)/g, "");
  const slug = clean
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .trim()
    .replace(/\s+/g, "-")
    .toLowerCase();
  return encodeURIComponent(slug);
}
