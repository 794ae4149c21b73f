/**
 * Date helpers. Every date in the pipeline is a UTC `Date`.
 *
 * @module dates
 */

import { InvalidValueError } from './errors.js';

export const DATE_FORMAT = 'YYYY-MM-DD';

export type Period = 'days' | 'weeks' | 'months';

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

// Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear does not.
function fromUtcParts(
  year: number,
  monthIndex: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  ms = 0,
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  date.setUTCHours(hours, minutes, seconds, ms);
  return date;
}

/** Build a UTC date; months are 1-based. */
export function utcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date {
  return fromUtcParts(year, month - 1, day, hours, minutes, seconds);
}

export function formatDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function formatTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/**
 * Parse a strict `YYYY-MM-DD` string.
 *
 * @throws RangeError when the string is not a real calendar date.
 */
export function parseDate(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new RangeError(`Date "${value}" does not match format ${DATE_FORMAT}.`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = utcDate(year, month, day);
  if (year === 0 || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new RangeError(`Date "${value}" is not a valid calendar date.`);
  }
  return date;
}

/** Midnight UTC of the calendar day of `date`. */
export function startOfDay(date: Date): Date {
  return utcDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Move `date` by `times` periods. Negative `times` moves backwards.
 *
 * Month arithmetic keeps the day of month, clamped to the target month's
 * last day (Mar 31 minus one month is Feb 28/29).
 */
export function addPeriod(date: Date, period: Period, times = 1): Date {
  switch (period) {
    case 'days':
    case 'weeks': {
      const days = period === 'weeks' ? 7 * times : times;
      const moved = new Date(date.getTime());
      moved.setUTCDate(moved.getUTCDate() + days);
      return moved;
    }
    case 'months': {
      const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() + times;
      const year = Math.floor(totalMonths / 12);
      const month = totalMonths - year * 12;
      const lastDay = fromUtcParts(year, month + 1, 0).getUTCDate();
      return fromUtcParts(
        year,
        month,
        Math.min(date.getUTCDate(), lastDay),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
        date.getUTCMilliseconds(),
      );
    }
    default:
      throw new InvalidValueError('Period is not valid.');
  }
}

/**
 * Truncate `date` to the beginning of its period.
 *
 * Weeks start on Sunday, so weekly results are available on Monday.
 */
export function truncateDate(date: Date, period: string): Date {
  switch (period) {
    case 'days':
      return startOfDay(date);
    case 'weeks':
      return addPeriod(startOfDay(date), 'days', -date.getUTCDay());
    case 'months':
      return utcDate(date.getUTCFullYear(), date.getUTCMonth() + 1, 1);
    default:
      throw new InvalidValueError('Period is not valid.');
  }
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}
