const MS_PER_DAY = 24 * 60 * 60 * 1000;

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Whole calendar days from `earlier` to `later`, ignoring time of day (UTC).
 * Negative when `earlier` is after `later`.
 */
export function calendarDaysBetween(later: Date, earlier: Date): number {
  return Math.round((utcMidnight(later) - utcMidnight(earlier)) / MS_PER_DAY);
}

/**
 * YYYY-MM-DD
 */
export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseDate(value: unknown): Date | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? undefined : parsed;
}
