import { describe, expect, it } from 'vitest';

import { ParseError } from './job-errors';
import {
  addDuration,
  durationBetween,
  formatDurationForClock,
  formatDurationForPath,
  formatTimestamp,
  parseDuration,
  parseTimestamp
} from './time';

describe('parseDuration', () => {
  it.each([
    ['0', 0],
    ['15', 15],
    ['5:00', 300],
    ['1:30:01', 5401],
    ['  0:05  ', 5],
    ['90:00', 5400],
    ['3600', 3600]
  ])('parses %j', (text, expected) => {
    expect(parseDuration(text)).toBe(expected);
  });

  it.each(['', '   ', 'abc', '1:2:3:4', '-5', '+5', '1::2', '1.5', '1:60', '0:00:75'])(
    'rejects %j',
    text => {
      expect(() => parseDuration(text)).toThrow(ParseError);
    }
  );

  it('bounds only the components after the first colon', () => {
    expect(parseDuration('75')).toBe(75);
    expect(parseDuration('75:00')).toBe(4500);
    expect(() => parseDuration('1:75')).toThrow("duration component out of range '75' in: 1:75");
  });
});

describe('formatDurationForPath', () => {
  it.each([
    [0, '0-00-00'],
    [300, '0-05-00'],
    [5401, '1-30-01'],
    [36_000, '10-00-00'],
    [-15, '-0-00-15']
  ])('formats %d as %s', (duration, expected) => {
    expect(formatDurationForPath(duration)).toBe(expected);
  });

  it('never emits forbidden filename characters', () => {
    for (const duration of [-3661, -1, 0, 59, 61, 3599, 86_399, 360_000]) {
      expect(formatDurationForPath(duration)).not.toMatch(/["*/:?\\|<>]/);
    }
  });
});

describe('formatDurationForClock', () => {
  it('renders a form parseDuration reads back', () => {
    expect(formatDurationForClock(5401)).toBe('1:30:01');
    expect(parseDuration(formatDurationForClock(5401))).toBe(5401);
  });
});

describe('parseTimestamp', () => {
  it('parses wall-clock timestamps into UTC fields', () => {
    expect(parseTimestamp('2020-01-02T03:04:05').toISOString()).toBe('2020-01-02T03:04:05.000Z');
  });

  it.each(['2020-01-01', '2020-01-01 00:00:00', '2020-13-01T00:00:00', '2021-02-29T00:00:00', '2020-01-01T24:00:00', 'soon'])(
    'rejects %j',
    text => {
      expect(() => parseTimestamp(text)).toThrow(ParseError);
    }
  );
});

describe('timestamp helpers', () => {
  const date = parseTimestamp('2020-01-01T00:00:00');

  it('formats with strftime tokens on the wall-clock value', () => {
    expect(formatTimestamp(date, '%Y-%m-%d %H-%M-%S')).toBe('2020-01-01 00-00-00');
  });

  it('adds and measures durations', () => {
    const later = addDuration(date, 3725);
    expect(formatTimestamp(later, '%H:%M:%S')).toBe('01:02:05');
    expect(durationBetween(date, later)).toBe(3725);
    expect(durationBetween(later, date)).toBe(-3725);
  });
});
