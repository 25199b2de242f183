/**
 * Rating extraction for book candidates.
 *
 * Accepts "<n>/5", "<n> out of 5" and "<n> stars". Anything else yields no
 * rating, and a candidate without a rating is dropped rather than defaulted.
 */

const RATING_PATTERN =
  /(\d+(?:\.\d+)?)\s*(?:\/\s*5(?:\.0+)?(?![\d.])|out\s+of\s+5(?:\.0+)?(?![\d.])|stars?\b)/i;

export const MAX_RATING = 5;

export function extractRating(text: string): number | undefined {
  const match = RATING_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const rating = Number.parseFloat(match[1]);
  if (!Number.isFinite(rating) || rating < 0 || rating > MAX_RATING) {
    return undefined;
  }
  return rating;
}
