/**
 * filters.ts
 *
 * SMALL, STRICT filters only.
 * No fuzzy logic - these are boolean predicates.
 */

/**
 * Title fragments that mark an alternate version of a song. Matching is a
 * plain substring test, so "Live Free" is excluded too; that is accepted.
 */
export const EXCLUDED_TITLE_KEYWORDS = [
  "remix",
  "edit",
  "version",
  "live",
  "rework",
  "acoustic",
  "cover",
  "tribute",
  "karaoke",
] as const;

/**
 * Key used for duplicate-title checks. Case is the only thing ignored.
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase();
}

/**
 * Check if a title looks like a remix, live take, cover, etc.
 */
export function isAlternateVersion(
  title: string,
  keywords: readonly string[] = EXCLUDED_TITLE_KEYWORDS,
): boolean {
  const t = normalizeTitle(title);
  return keywords.some((kw) => t.includes(kw.toLowerCase()));
}

export function isWithinPopularityCeiling(
  popularity: number,
  ceiling: number,
): boolean {
  return popularity <= ceiling;
}
