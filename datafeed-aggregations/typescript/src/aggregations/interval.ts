/**
 * Bucketing interval extraction.
 * @module aggregations/interval
 */

import { ConfigurationError, InvalidStateError } from '../errors/categories.js';
import { Messages } from '../errors/messages.js';
import { resolveCalendarInterval } from '../time/calendar.js';
import { estimateFixedIntervalMillis } from '../time/duration.js';
import { isUtcTimeZone } from '../time/zone.js';
import type {
  AggregationNode,
  CompositeAggregation,
  DateBucketSpec,
  DateHistogramAggregation,
  DateHistogramValueSource,
} from '../types/aggregation.js';
import {
  extractDateHistogramSource,
  locateDateBucketAggregation,
  type SourceExtractionOptions,
} from './locate.js';

/**
 * Where a date bucketing spec was read from.
 */
export type DateBucketOrigin =
  | { readonly kind: 'aggregation'; readonly aggregation: DateHistogramAggregation }
  | { readonly kind: 'value_source'; readonly source: DateHistogramValueSource };

/**
 * Builds the spec of a date_histogram aggregation.
 */
export function dateBucketSpecFromAggregation(agg: DateHistogramAggregation): DateBucketSpec {
  return specOf({ kind: 'aggregation', aggregation: agg });
}

/**
 * Builds the spec of a composite aggregation's date_histogram value source.
 *
 * @throws {ConfigurationError} If the composite has no date_histogram source
 */
export function dateBucketSpecFromComposite(
  composite: CompositeAggregation,
  options: SourceExtractionOptions = {}
): DateBucketSpec {
  return specOf({ kind: 'value_source', source: extractDateHistogramSource(composite, options) });
}

function specOf(origin: DateBucketOrigin): DateBucketSpec {
  const holder = origin.kind === 'aggregation' ? origin.aggregation : origin.source;
  return {
    timeZone: holder.timeZone,
    fixedInterval: holder.fixedInterval,
    calendarInterval: holder.calendarInterval,
  };
}

/**
 * Returns the bucketing interval of a histogram, date_histogram or
 * composite aggregation in milliseconds.
 *
 * @throws {ConfigurationError} If the date interval configuration is rejected
 * @throws {InvalidStateError} If the node is not a bucketing aggregation
 */
export function intervalMillis(
  node: AggregationNode,
  options: SourceExtractionOptions = {}
): number {
  switch (node.type) {
    case 'histogram':
      return Math.trunc(node.interval);
    case 'date_histogram':
      return validateAndResolveDateInterval(dateBucketSpecFromAggregation(node));
    case 'composite':
      return validateAndResolveDateInterval(dateBucketSpecFromComposite(node, options));
    case 'other':
      throw new InvalidStateError(Messages.NOT_A_HISTOGRAM, {
        aggregation: node.name,
        kind: node.kind,
      });
  }
}

/**
 * Validates a date bucketing spec and returns its interval in milliseconds.
 *
 * The time zone must be unset or UTC. A calendar interval takes precedence
 * over a fixed one.
 *
 * @throws {ConfigurationError} If the spec is rejected
 */
export function validateAndResolveDateInterval(spec: DateBucketSpec): number {
  if (spec.timeZone !== undefined && !isUtcTimeZone(spec.timeZone)) {
    throw new ConfigurationError(Messages.TIME_ZONE_MUST_BE_UTC, { timeZone: spec.timeZone });
  }

  if (spec.calendarInterval !== undefined) {
    return resolveCalendarInterval(spec.calendarInterval);
  }
  if (spec.fixedInterval !== undefined) {
    return estimateFixedIntervalMillis(spec.fixedInterval);
  }
  throw new ConfigurationError(Messages.MISSING_INTERVAL);
}

/**
 * Locates the date bucketing aggregation and returns its interval.
 */
export function histogramIntervalMillis(
  aggregations: readonly AggregationNode[],
  options: SourceExtractionOptions = {}
): number {
  return intervalMillis(locateDateBucketAggregation(aggregations), options);
}
