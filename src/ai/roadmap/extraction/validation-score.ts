const SCORE_PATTERNS = [
  /(\d+(?:\.\d+)?)\s*\/\s*10\b/,
  /score\s*[:=]?\s*(\d+(?:\.\d+)?)/i,
];

/**
 * Reads a 1-10 rubric score from a validation answer, clamped to the scale.
 */
export function extractValidationScore(text: string): number | undefined {
  for (const pattern of SCORE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const score = Number.parseFloat(match[1]);
      if (Number.isFinite(score)) {
        return Math.min(10, Math.max(1, score));
      }
    }
  }
  return undefined;
}
