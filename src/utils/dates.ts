import { format, isValid, parse, startOfMonth, startOfWeek } from 'date-fns';

export const DATE_FORMAT = 'yyyy-MM-dd';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Validate a `YYYY-MM-DD` calendar date.
 * Returns the normalized string, or null for malformed or impossible dates
 * such as `2025-02-30`.
 */
export function parseCalendarDate(value: unknown): string | null {
  if (typeof value !== 'string' || !DATE_PATTERN.test(value)) {
    return null;
  }
  const parsed = parse(value, DATE_FORMAT, new Date(2000, 0, 1));
  if (!isValid(parsed) || format(parsed, DATE_FORMAT) !== value) {
    return null;
  }
  return value;
}

export function toCalendarDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

export interface DateWindows {
  today: string;
  weekStart: string;
  monthStart: string;
}

// Weeks start on Monday regardless of locale.
export function dateWindows(now: Date): DateWindows {
  return {
    today: toCalendarDate(now),
    weekStart: toCalendarDate(startOfWeek(now, { weekStartsOn: 1 })),
    monthStart: toCalendarDate(startOfMonth(now))
  };
}
