import strftime from 'strftime';

import { ParseError } from './job-errors';

/** Signed span of time in whole seconds. */
export type Duration = number;

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3600;
const MAX_DURATION_PARTS = 3;

const DIGITS = /^\d+$/;
const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

// Wall-clock dates are carried in the UTC fields of a Date.
const strftimeWallClock = strftime.utc();

/**
 * Parses `[[H:]MM:]SS`. The leading component is unbounded, so a bare
 * integer is a number of seconds and `90:00` is ninety minutes. Minutes
 * and seconds after the first colon must be below 60: `1:75` is rejected.
 */
export function parseDuration(text: string): Duration {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ParseError('duration cannot be empty');
  }

  const parts = trimmed.split(':');
  if (parts.length > MAX_DURATION_PARTS) {
    throw new ParseError(`too many parts in duration: ${trimmed}`);
  }

  let total = 0;
  parts.forEach((part, index) => {
    if (!DIGITS.test(part)) {
      throw new ParseError(`invalid duration component '${part}' in: ${trimmed}`);
    }
    const value = Number(part);
    if (index > 0 && value >= SECONDS_PER_MINUTE) {
      throw new ParseError(`duration component out of range '${part}' in: ${trimmed}`);
    }
    total = total * SECONDS_PER_MINUTE + value;
  });
  return total;
}

const splitDuration = (duration: Duration) => {
  const magnitude = Math.abs(duration);
  return {
    sign: duration < 0 ? '-' : '',
    hours: Math.floor(magnitude / SECONDS_PER_HOUR),
    minutes: Math.floor((magnitude % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    seconds: magnitude % SECONDS_PER_MINUTE
  };
};

const pad = (value: number) => value.toString().padStart(2, '0');

/** Renders `H-MM-SS` for use inside filenames. */
export function formatDurationForPath(duration: Duration): string {
  const { sign, hours, minutes, seconds } = splitDuration(duration);
  return `${sign}${hours}-${pad(minutes)}-${pad(seconds)}`;
}

/** Renders `H:MM:SS`, which {@link parseDuration} reads back. */
export function formatDurationForClock(duration: Duration): string {
  const { sign, hours, minutes, seconds } = splitDuration(duration);
  return `${sign}${hours}:${pad(minutes)}:${pad(seconds)}`;
}

/** Parses `YYYY-MM-DDTHH:MM:SS` as a wall-clock time. */
export function parseTimestamp(text: string): Date {
  const match = TIMESTAMP.exec(text.trim());
  if (!match) {
    throw new ParseError(`invalid timestamp (expected YYYY-MM-DDTHH:MM:SS): ${text}`);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  if (!roundTrips) {
    throw new ParseError(`timestamp out of range: ${text}`);
  }
  return date;
}

export const formatTimestamp = (date: Date, format: string): string => strftimeWallClock(format, date);

export const addDuration = (date: Date, duration: Duration): Date =>
  new Date(date.getTime() + duration * 1000);

/** Whole seconds from `from` to `to`, rounded toward zero. */
export const durationBetween = (from: Date, to: Date): Duration =>
  Math.trunc((to.getTime() - from.getTime()) / 1000);

/** The local wall-clock time, carried in UTC fields like parsed timestamps. */
export const wallClockNow = (now = new Date()): Date =>
  new Date(now.getTime() - now.getTimezoneOffset() * 60_000);
