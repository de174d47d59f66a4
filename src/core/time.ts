/**
 * Time utilities for consistent date handling
 *
 * Calendar dates travel through the app as `yyyy-MM-dd` strings in local time.
 */

import {
  addDays,
  differenceInCalendarDays,
  format,
  isValid,
  isWeekend,
  parse,
  startOfDay,
  subDays,
} from 'date-fns';

const DAY_KEY_FORMAT = 'yyyy-MM-dd';

export function getCurrentDate(): Date {
  return new Date();
}

export function formatDate(date: Date): string {
  return format(date, DAY_KEY_FORMAT);
}

/**
 * Strict `yyyy-MM-dd` parser. Returns null for anything that does not
 * round-trip, so `2024-02-30` or `24-1-5` are rejected.
 */
export function parseDayKey(value: string): Date | null {
  const parsed = parse(value, DAY_KEY_FORMAT, new Date(0));
  if (!isValid(parsed) || format(parsed, DAY_KEY_FORMAT) !== value) {
    return null;
  }
  return parsed;
}

export function isWeekendDay(dayKey: string): boolean {
  const date = parseDayKey(dayKey);
  return date !== null && isWeekend(date);
}

/** Inclusive list of day keys from start to end, ascending. */
export function eachDayKey(startDate: string, endDate: string): string[] {
  const start = parseDayKey(startDate);
  const end = parseDayKey(endDate);
  if (!start || !end) return [];

  const days: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    days.push(formatDate(current));
  }
  return days;
}

/** Whole calendar days from `dayKey` to `reference` (positive when dayKey is in the past). */
export function daysBefore(dayKey: string, reference: Date): number {
  const date = parseDayKey(dayKey);
  if (!date) return 0;
  return differenceInCalendarDays(startOfDay(reference), date);
}

export function getDateRange(days: number, now: Date = getCurrentDate()): {
  startDate: string;
  endDate: string;
} {
  const end = startOfDay(now);
  return {
    startDate: formatDate(subDays(end, days)),
    endDate: formatDate(end),
  };
}

export function formatRunTimestamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}
