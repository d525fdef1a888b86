/**
 * UTC calendar-date helpers. A calendar date is a `YYYY-MM-DD` string, which
 * orders correctly under plain string comparison.
 */

import { ValidationError } from './validation.js';

export type CalendarDate = string;

const CALENDAR_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Truncates an instant to its UTC calendar date.
 */
export function toCalendarDate(instant: Date): CalendarDate {
  return instant.toISOString().slice(0, 10);
}

/**
 * Validates a `YYYY-MM-DD` string (or truncates a Date) into a CalendarDate.
 */
export function parseCalendarDate(value: string | Date): CalendarDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError('Invalid date', 'date');
    }
    return toCalendarDate(value);
  }

  if (!CALENDAR_DATE_REGEX.test(value)) {
    throw new ValidationError(`Invalid calendar date: "${value}". Expected YYYY-MM-DD`, 'date');
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  // Rejects dates like 2024-02-30 that Date silently rolls over
  if (Number.isNaN(parsed.getTime()) || toCalendarDate(parsed) !== value) {
    throw new ValidationError(`Invalid calendar date: "${value}"`, 'date');
  }
  return value;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const start = new Date(`${date}T00:00:00Z`).getTime();
  return toCalendarDate(new Date(start + days * DAY_MS));
}

/**
 * Inclusive, ascending sequence of dates. Empty when start is after end.
 */
export function dateRange(start: CalendarDate, end: CalendarDate): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}
