/**
 * User-facing messages for rejected datafeed aggregation configurations.
 * @module errors/messages
 */

export const Messages = {
  REQUIRES_DATE_BUCKETING: 'aggregations require a date bucketing aggregation',
  NO_SIBLINGS: 'no sibling aggregations allowed alongside the date bucketing aggregation',
  COMPOSITE_REQUIRES_ONE_DATE_SOURCE:
    'composite aggregations require exactly one date_histogram value source',
  TIME_ZONE_MUST_BE_UTC: 'date_histogram time_zone must be UTC',
  MISSING_INTERVAL: 'must specify an interval for date_histogram',
  CALENDAR_INTERVAL_TOO_LONG:
    'calendar interval too long; intervals longer than a week are not accepted because higher units have variable length',
  INVALID_INTERVAL_SYNTAX: 'invalid interval syntax',
  NOT_A_HISTOGRAM: 'not a recognized histogram aggregation',
  UNEXPECTED_CALENDAR_UNIT: 'unexpected calendar unit',
  INVALID_AGGREGATION: 'invalid aggregation definition',
  TIME_RANGE_START_AFTER_END: 'time range start must not be after its end',
} as const;
