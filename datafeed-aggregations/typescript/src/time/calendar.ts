/**
 * Calendar interval resolution.
 * @module time/calendar
 */

import { Duration } from 'luxon';
import { ConfigurationError, InvalidStateError } from '../errors/categories.js';
import { Messages } from '../errors/messages.js';
import { durationDays, durationMillis, parseDuration } from './duration.js';

/**
 * Calendar units a date_histogram understands.
 */
export enum CalendarUnit {
  Year = 'year',
  Quarter = 'quarter',
  Month = 'month',
  Week = 'week',
  Day = 'day',
  Hour = 'hour',
  Minute = 'minute',
  Second = 'second',
}

/**
 * Symbolic calendar intervals and their unit. Case-sensitive: "1M" is a
 * month, "1m" a minute.
 */
export const CALENDAR_UNITS: ReadonlyMap<string, CalendarUnit> = new Map([
  ['year', CalendarUnit.Year],
  ['1y', CalendarUnit.Year],
  ['quarter', CalendarUnit.Quarter],
  ['1q', CalendarUnit.Quarter],
  ['month', CalendarUnit.Month],
  ['1M', CalendarUnit.Month],
  ['week', CalendarUnit.Week],
  ['1w', CalendarUnit.Week],
  ['day', CalendarUnit.Day],
  ['1d', CalendarUnit.Day],
  ['hour', CalendarUnit.Hour],
  ['1h', CalendarUnit.Hour],
  ['minute', CalendarUnit.Minute],
  ['1m', CalendarUnit.Minute],
  ['second', CalendarUnit.Second],
  ['1s', CalendarUnit.Second],
]);

/** Longest accepted calendar interval, in whole days. */
export const MAX_CALENDAR_INTERVAL_DAYS = 7;

export function isCalendarUnit(text: string): boolean {
  return CALENDAR_UNITS.has(text);
}

/**
 * Resolves a calendar interval to milliseconds.
 *
 * Symbolic units up to a week map to their exact length. Month, quarter and
 * year have no fixed length and are always rejected. Anything else is parsed
 * as a duration literal and must not exceed a week.
 *
 * @throws {ConfigurationError} If the interval is too long or unparsable
 */
export function resolveCalendarInterval(text: string): number {
  const unit = CALENDAR_UNITS.get(text);
  const interval =
    unit !== undefined
      ? durationOfUnit(unit, text)
      : parseDuration(text, 'date_histogram.calendar_interval');

  const millis = durationMillis(interval);
  if (millis < 0) {
    throw new ConfigurationError(Messages.INVALID_INTERVAL_SYNTAX, {
      setting: 'date_histogram.calendar_interval',
      value: text,
      reason: 'interval must not be negative',
    });
  }
  if (durationDays(interval) > MAX_CALENDAR_INTERVAL_DAYS) {
    throw calendarIntervalTooLong(text);
  }
  return millis;
}

function durationOfUnit(unit: CalendarUnit, text: string): Duration {
  switch (unit) {
    case CalendarUnit.Week:
      return Duration.fromObject({ weeks: 1 });
    case CalendarUnit.Day:
      return Duration.fromObject({ days: 1 });
    case CalendarUnit.Hour:
      return Duration.fromObject({ hours: 1 });
    case CalendarUnit.Minute:
      return Duration.fromObject({ minutes: 1 });
    case CalendarUnit.Second:
      return Duration.fromObject({ seconds: 1 });
    case CalendarUnit.Month:
    case CalendarUnit.Quarter:
    case CalendarUnit.Year:
      throw calendarIntervalTooLong(text);
    default:
      return unexpectedUnit(unit);
  }
}

function unexpectedUnit(unit: never): never {
  throw new InvalidStateError(Messages.UNEXPECTED_CALENDAR_UNIT, { unit: String(unit) });
}

function calendarIntervalTooLong(interval: string): ConfigurationError {
  return new ConfigurationError(Messages.CALENDAR_INTERVAL_TOO_LONG, {
    calendarInterval: interval,
  });
}
