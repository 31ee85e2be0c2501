// Tests for timestamp helpers

import { describe, it, expect } from 'vitest';
import { formatTimestamp, parseTimestamp } from './time.js';

describe('parseTimestamp', () => {
  it('parses a zoneless timestamp as UTC', () => {
    const result = parseTimestamp('2012-02-26T00:03:54');

    expect(result).toEqual({ success: true, value: new Date(Date.UTC(2012, 1, 26, 0, 3, 54)) });
  });

  it('keeps millisecond precision from microsecond fractions', () => {
    const result = parseTimestamp('2019-11-05T14:12:36.123456');

    expect(result.success && result.value.toISOString()).toBe('2019-11-05T14:12:36.123Z');
  });

  it('pads short fractions', () => {
    const result = parseTimestamp('2019-11-05T14:12:36.5');

    expect(result.success && result.value.getUTCMilliseconds()).toBe(500);
  });

  it('accepts a trailing Z and date-only values', () => {
    expect(parseTimestamp('2019-11-05T14:12:36Z').success).toBe(true);

    const dateOnly = parseTimestamp('2019-03-11');
    expect(dateOnly.success && dateOnly.value.toISOString()).toBe('2019-03-11T00:00:00.000Z');
  });

  it('rejects out-of-range fields', () => {
    expect(parseTimestamp('2019-13-01T00:00:00').success).toBe(false);
    expect(parseTimestamp('2019-02-30T00:00:00').success).toBe(false);
    expect(parseTimestamp('2019-02-01T24:00:00').success).toBe(false);
  });

  it('rejects other formats', () => {
    const result = parseTimestamp('26/02/2012');

    expect(result).toEqual({ success: false, error: 'Invalid timestamp "26/02/2012"' });
  });
});

describe('formatTimestamp', () => {
  it('drops the zone designator', () => {
    expect(formatTimestamp(new Date(Date.UTC(2020, 0, 2, 3, 4, 5)))).toBe('2020-01-02T03:04:05');
  });

  it('keeps milliseconds when present', () => {
    expect(formatTimestamp(new Date(Date.UTC(2020, 0, 2, 3, 4, 5, 678)))).toBe(
      '2020-01-02T03:04:05.678'
    );
  });

  it('formats fractions the parser reads back', () => {
    const date = new Date(Date.UTC(2012, 11, 31, 23, 59, 59, 500));

    expect(parseTimestamp(formatTimestamp(date))).toEqual({ success: true, value: date });
  });
});
