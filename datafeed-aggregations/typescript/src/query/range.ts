/**
 * Time-range query construction for datafeed searches.
 * @module query/range
 */

import { ConfigurationError } from '../errors/categories.js';
import { Messages } from '../errors/messages.js';
import type { QueryDSL, RangeQuery, TimeRangeFilterQuery } from '../types/query.js';

/** Date format telling the search engine that range bounds are epoch milliseconds. */
export const EPOCH_MILLIS_FORMAT = 'epoch_millis';

/**
 * A range predicate `timeField >= start AND timeField < end` on epoch milliseconds.
 */
export function timeRangeQuery(timeField: string, start: number, end: number): RangeQuery {
  return {
    range: {
      [timeField]: {
        gte: start,
        lt: end,
        format: EPOCH_MILLIS_FORMAT,
      },
    },
  };
}

/**
 * Combines a user query with the half-open time window `[start, end)`.
 *
 * Both clauses are filters, so they do not contribute to scoring. No check
 * that `start <= end` is made here; see {@link assertTimeRange}.
 */
export function wrapInTimeRangeQuery(
  userQuery: QueryDSL,
  timeField: string,
  start: number,
  end: number
): TimeRangeFilterQuery {
  return {
    bool: {
      filter: [userQuery, timeRangeQuery(timeField, start, end)],
    },
  };
}

/**
 * @throws {ConfigurationError} If the window starts after it ends
 */
export function assertTimeRange(start: number, end: number): void {
  if (start > end) {
    throw new ConfigurationError(Messages.TIME_RANGE_START_AFTER_END, { start, end });
  }
}
