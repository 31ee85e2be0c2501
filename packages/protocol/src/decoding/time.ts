// Timestamp helpers
//
// The service writes times in UTC without a zone designator, with optional
// fractional seconds: "2012-02-26T00:03:54" or "2019-11-05T14:12:36.123456".
// Some date-only fields ("2019-03-11") use the same helpers.

import type { Result } from '../types/common.js';

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?)?Z?$/;

/**
 * Parse a service timestamp as UTC
 */
export function parseTimestamp(input: string): Result<Date, string> {
  const match = TIMESTAMP_PATTERN.exec(input);
  if (!match) {
    return { success: false, error: `Invalid timestamp "${input}"` };
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = ''] = match;
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));
  const date = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second), millis)
  );

  // Date.UTC rolls over out-of-range fields (month 13, Feb 30); reject those
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hour) ||
    date.getUTCMinutes() !== Number(minute) ||
    date.getUTCSeconds() !== Number(second)
  ) {
    return { success: false, error: `Invalid timestamp "${input}"` };
  }

  return { success: true, value: date };
}

/**
 * Whether a Date holds an actual point in time
 */
export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Format a date the way the service expects it in query filters.
 * Milliseconds are kept when present so inclusive bounds stay exact.
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return date.getUTCMilliseconds() === 0 ? iso.slice(0, 19) : iso.slice(0, 23);
}
