/**
 * AggregationValidator: the entry point a datafeed extraction pipeline uses
 * to size its extraction windows and build its searches.
 * @module validator
 */

import { intervalMillis } from './aggregations/interval.js';
import { dateHistogramSources, locateDateBucketAggregation } from './aggregations/locate.js';
import { parseAggregations } from './aggregations/parser.js';
import { validateConfig, type ValidatorConfig } from './config.js';
import { createLogger } from './observability/logger.js';
import { LOG_LEVELS, type Logger } from './observability/types.js';
import { assertTimeRange, wrapInTimeRangeQuery } from './query/range.js';
import type { AggregationNode } from './types/aggregation.js';
import type { QueryDSL, TimeRangeFilterQuery } from './types/query.js';

export interface AggregationValidatorOptions {
  /** Validator configuration; defaults apply to omitted fields */
  config?: Partial<ValidatorConfig>;
  /** Logger, created from the configuration when omitted */
  logger?: Logger;
}

/**
 * Validates datafeed aggregations and resolves their bucketing interval.
 *
 * @example
 * ```typescript
 * const validator = new AggregationValidator();
 * const interval = validator.validateAggregations({
 *   buckets: {
 *     date_histogram: { field: 'timestamp', fixed_interval: '5m' },
 *     aggs: { timestamp: { max: { field: 'timestamp' } } },
 *   },
 * });
 * // interval === 300000
 * ```
 */
export class AggregationValidator {
  readonly config: ValidatorConfig;
  private readonly logger: Logger;

  constructor(options: AggregationValidatorOptions = {}) {
    this.config = validateConfig(options.config ?? {});
    this.logger =
      options.logger ??
      createLogger({
        name: 'datafeed-aggregations',
        level: LOG_LEVELS[this.config.logLevel],
        json: this.config.logJson,
      });
  }

  /**
   * Parses an `aggregations` object and returns its bucketing interval.
   */
  validateAggregations(json: unknown): number {
    return this.histogramIntervalMillis(parseAggregations(json));
  }

  /**
   * Locates the date bucketing aggregation and returns its interval in milliseconds.
   */
  histogramIntervalMillis(aggregations: readonly AggregationNode[]): number {
    return this.intervalMillis(this.locateDateBucketAggregation(aggregations));
  }

  locateDateBucketAggregation(aggregations: readonly AggregationNode[]): AggregationNode {
    return locateDateBucketAggregation(aggregations);
  }

  intervalMillis(node: AggregationNode): number {
    if (node.type === 'composite') {
      const sources = dateHistogramSources(node);
      if (sources.length > 1 && !this.config.strictCompositeSources) {
        this.logger.warn('composite aggregation has several date_histogram sources; using the first', {
          aggregation: node.name,
          sources: sources.map((source) => source.name),
        });
      }
    }

    const interval = intervalMillis(node, {
      strictCompositeSources: this.config.strictCompositeSources,
    });
    this.logger.debug('resolved bucketing interval', {
      aggregation: node.name,
      type: node.type,
      intervalMs: interval,
    });
    return interval;
  }

  /**
   * Combines a user query with the time window `[start, end)`, checking the
   * window first when `validateTimeRange` is set.
   */
  wrapInTimeRangeQuery(
    userQuery: QueryDSL,
    timeField: string,
    start: number,
    end: number
  ): TimeRangeFilterQuery {
    if (this.config.validateTimeRange) {
      assertTimeRange(start, end);
    }
    return wrapInTimeRangeQuery(userQuery, timeField, start, end);
  }
}
