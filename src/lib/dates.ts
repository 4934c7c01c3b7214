/**
 * Calendar date helpers. Dates are kept as `YYYY-MM-DD` strings so that
 * period matching never depends on the host time zone.
 */

import type { CalendarDate } from '@/types/finance';
import { InvalidDateError, InvalidPeriodError } from './errors';

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Normalize a date input to `YYYY-MM-DD`. A `Date` is read in local time;
 * a missing value means today.
 */
export function toCalendarDate(input?: CalendarDate | Date, now: Date = new Date()): CalendarDate {
  if (input === undefined) {
    return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
  }

  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new InvalidDateError(input);
    }
    return `${input.getFullYear()}-${pad2(input.getMonth() + 1)}-${pad2(input.getDate())}`;
  }

  const match = CALENDAR_DATE_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidDateError(input);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new InvalidDateError(input);
  }

  return `${match[1]}-${match[2]}-${match[3]}`;
}

export function assertValidPeriod(year: number, month: number): void {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidPeriodError(year, month);
  }
}

export function formatPeriod(year: number, month: number): string {
  return `${String(year).padStart(4, '0')}-${pad2(month)}`;
}

export function isInPeriod(date: CalendarDate, year: number, month: number): boolean {
  return date.startsWith(`${formatPeriod(year, month)}-`);
}
