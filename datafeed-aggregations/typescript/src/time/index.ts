export {
  parseDuration,
  durationMillis,
  durationDays,
  estimateFixedIntervalMillis,
  type DurationUnit,
} from './duration.js';

export {
  CalendarUnit,
  CALENDAR_UNITS,
  MAX_CALENDAR_INTERVAL_DAYS,
  isCalendarUnit,
  resolveCalendarInterval,
} from './calendar.js';

export { fixedOffsetSeconds, isUtcTimeZone, isKnownTimeZone } from './zone.js';
