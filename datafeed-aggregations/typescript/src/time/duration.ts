/**
 * Duration literals ("30s", "90m", "3d") as the search engine parses them.
 * @module time/duration
 */

import { Duration } from 'luxon';
import { ConfigurationError } from '../errors/categories.js';
import { Messages } from '../errors/messages.js';

export type DurationUnit = 'nanos' | 'micros' | 'ms' | 's' | 'm' | 'h' | 'd';

/**
 * Suffixes in match order. Longer suffixes come first so "ms" is not read as "s".
 */
const UNIT_SUFFIXES: readonly DurationUnit[] = ['nanos', 'micros', 'ms', 's', 'm', 'h', 'd'];

const INTEGER_PATTERN = /^-?\d+$/;
const FRACTIONAL_PATTERN = /^-?\d*\.\d+$/;

const NANOS_PER_MILLI = 1_000_000;
const MICROS_PER_MILLI = 1000;

/**
 * Parses a duration literal into a luxon `Duration`.
 *
 * Accepts an integer followed by one of `nanos`, `micros`, `ms`, `s`, `m`,
 * `h`, `d` (case-insensitive, surrounding whitespace ignored), plus the bare
 * values `-1` and `0`. Sub-millisecond units truncate to whole milliseconds.
 *
 * @param text - The literal to parse
 * @param settingName - Name of the setting being parsed, reported in error details
 * @throws {ConfigurationError} If the literal is not a valid duration
 */
export function parseDuration(text: string, settingName: string): Duration {
  const normalized = text.toLowerCase().trim();

  if (normalized === '-1' || normalized === '0') {
    return Duration.fromObject({ milliseconds: Number(normalized) });
  }

  const suffix = UNIT_SUFFIXES.find((unit) => normalized.endsWith(unit));
  if (suffix === undefined) {
    throw invalidDuration(text, settingName, 'unit is missing or unrecognized');
  }

  const amount = normalized.slice(0, normalized.length - suffix.length).trim();
  const duration = toDuration(parseAmount(amount, text, settingName), suffix);
  if (!Number.isSafeInteger(durationMillis(duration))) {
    throw invalidDuration(text, settingName, 'value is out of range');
  }
  return duration;
}

/** Length in whole milliseconds. */
export function durationMillis(duration: Duration): number {
  return duration.as('milliseconds') || 0;
}

/** Length in whole days, truncated. */
export function durationDays(duration: Duration): number {
  return Math.trunc(duration.as('days')) || 0;
}

function toDuration(amount: number, unit: DurationUnit): Duration {
  switch (unit) {
    case 'nanos':
      return Duration.fromObject({ milliseconds: Math.trunc(amount / NANOS_PER_MILLI) || 0 });
    case 'micros':
      return Duration.fromObject({ milliseconds: Math.trunc(amount / MICROS_PER_MILLI) || 0 });
    case 'ms':
      return Duration.fromObject({ milliseconds: amount });
    case 's':
      return Duration.fromObject({ seconds: amount });
    case 'm':
      return Duration.fromObject({ minutes: amount });
    case 'h':
      return Duration.fromObject({ hours: amount });
    case 'd':
      return Duration.fromObject({ days: amount });
  }
}

function parseAmount(amount: string, text: string, settingName: string): number {
  if (INTEGER_PATTERN.test(amount)) {
    const value = Number.parseInt(amount, 10);
    if (!Number.isSafeInteger(value)) {
      throw invalidDuration(text, settingName, 'value is out of range');
    }
    if (value < -1) {
      throw invalidDuration(text, settingName, 'negative durations are not supported');
    }
    return value;
  }

  const reason = FRACTIONAL_PATTERN.test(amount)
    ? 'fractional time values are not supported'
    : 'value is not an integer';
  throw invalidDuration(text, settingName, reason);
}

function invalidDuration(text: string, settingName: string, reason: string): ConfigurationError {
  return new ConfigurationError(Messages.INVALID_INTERVAL_SYNTAX, {
    setting: settingName,
    value: text,
    reason,
  });
}

/**
 * Millisecond length of a fixed interval such as "30s" or "2h".
 *
 * @throws {ConfigurationError} If the interval is unparsable or negative
 */
export function estimateFixedIntervalMillis(fixedInterval: string): number {
  const setting = 'date_histogram.fixed_interval';
  const millis = durationMillis(parseDuration(fixedInterval, setting));
  if (millis < 0) {
    throw invalidDuration(fixedInterval, setting, 'interval must not be negative');
  }
  return millis;
}
