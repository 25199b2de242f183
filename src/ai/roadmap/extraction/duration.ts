const DURATION_PATTERN = /(\d+)\s*(week|month)/i;

/**
 * Converts "6 weeks" or "2 months" into weeks; a month counts as four weeks.
 */
export function durationInWeeks(duration: string): number | undefined {
  const match = DURATION_PATTERN.exec(duration);
  if (!match) {
    return undefined;
  }
  const amount = Number.parseInt(match[1], 10);
  return match[2].toLowerCase() === "month" ? amount * 4 : amount;
}

export function totalWeeks(durations: string[]): number {
  return durations.reduce((sum, duration) => sum + (durationInWeeks(duration) ?? 0), 0);
}
