/**
 * Calendar date helpers. Dates travel through the pipeline as
 * `YYYY-MM-DD` strings in the athlete's local calendar.
 */

import { eachDayOfInterval, format, isValid, parse, subDays, subMonths } from 'date-fns';

const ISO_DATE = 'yyyy-MM-dd';
const ISO_DATE_SHAPE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a `YYYY-MM-DD` string to a local-midnight Date, or null when the
 * string is not a real calendar date (2024-02-30 is rejected).
 */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_SHAPE.test(value)) return null;
  const parsed = parse(value, ISO_DATE, new Date());
  return isValid(parsed) ? parsed : null;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE);
}

/**
 * Inclusive list of dates from start to end, ascending. Both ends must
 * already be validated and ordered.
 */
export function eachDateInRange(start: Date, end: Date): string[] {
  return eachDayOfInterval({ start, end }).map(toIsoDate);
}

export function todayIso(now: Date = new Date()): string {
  return toIsoDate(now);
}

export function daysBefore(now: Date, days: number): string {
  return toIsoDate(subDays(now, days));
}

export function monthsBefore(now: Date, months: number): string {
  return toIsoDate(subMonths(now, months));
}

/**
 * Calendar date of a vendor local timestamp such as "2024-01-02 07:15:00".
 */
export function dateOfLocalTimestamp(timestamp: string): string | null {
  const datePart = timestamp.slice(0, 10);
  return isIsoDate(datePart) ? datePart : null;
}
