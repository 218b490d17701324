/**
 * datafeed-aggregations
 *
 * Finds the date bucketing aggregation of an anomaly-detection datafeed,
 * resolves its interval in milliseconds and builds the time-windowed
 * searches the datafeed runs.
 *
 * @example
 * ```typescript
 * import { AggregationValidator, parseAggregations, histogramIntervalMillis } from 'datafeed-aggregations';
 *
 * const aggregations = parseAggregations({
 *   buckets: {
 *     date_histogram: { field: 'timestamp', calendar_interval: '1h' },
 *     aggs: { timestamp: { max: { field: 'timestamp' } } },
 *   },
 * });
 * histogramIntervalMillis(aggregations); // 3600000
 *
 * const validator = new AggregationValidator({ config: { validateTimeRange: true } });
 * const query = validator.wrapInTimeRangeQuery({ match_all: {} }, 'timestamp', 0, 3600000);
 * ```
 */

// Validator exports
export { AggregationValidator, type AggregationValidatorOptions } from './validator.js';

// Configuration exports
export {
  ValidatorConfig,
  ValidatorConfigBuilder,
  validatorConfigSchema,
  createDefaultConfig,
  validateConfig,
  fromEnv,
  DEFAULT_STRICT_COMPOSITE_SOURCES,
  DEFAULT_VALIDATE_TIME_RANGE,
  DEFAULT_LOG_LEVEL,
} from './config.js';

// Aggregation exports
export * from './aggregations/index.js';

// Query exports
export * from './query/index.js';

// Time exports
export * from './time/index.js';

// Error exports
export * from './errors/index.js';

// Observability exports
export * from './observability/index.js';

// Type exports
export * from './types/index.js';
