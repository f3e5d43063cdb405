import { describe, it, expect } from 'vitest';
import { calendarDaysBetween, formatCalendarDate, parseDate } from '../../src/utils/dates';

describe('calendarDaysBetween', () => {
  it('counts calendar days regardless of time of day', () => {
    expect(
      calendarDaysBetween(new Date('2026-03-10T01:00:00Z'), new Date('2026-03-09T23:00:00Z'))
    ).toBe(1);
  });

  it('is zero on the same day', () => {
    expect(
      calendarDaysBetween(new Date('2026-03-10T23:59:00Z'), new Date('2026-03-10T00:00:00Z'))
    ).toBe(0);
  });

  it('is negative for future dates', () => {
    expect(calendarDaysBetween(new Date('2026-03-10T12:00:00Z'), new Date('2026-03-12T12:00:00Z'))).toBe(-2);
  });

  it('spans month boundaries', () => {
    expect(calendarDaysBetween(new Date('2026-03-01T00:00:00Z'), new Date('2026-02-27T00:00:00Z'))).toBe(2);
  });
});

describe('formatCalendarDate', () => {
  it('formats as YYYY-MM-DD', () => {
    expect(formatCalendarDate(new Date('2026-03-09T15:30:00Z'))).toBe('2026-03-09');
  });
});

describe('parseDate', () => {
  it('parses ISO strings and epoch milliseconds', () => {
    expect(parseDate('2026-03-09T00:00:00Z')).toEqual(new Date('2026-03-09T00:00:00Z'));
    expect(parseDate(0)).toEqual(new Date(0));
  });

  it('returns undefined for invalid or missing values', () => {
    expect(parseDate('soon')).toBeUndefined();
    expect(parseDate(undefined)).toBeUndefined();
    expect(parseDate({})).toBeUndefined();
  });
});
