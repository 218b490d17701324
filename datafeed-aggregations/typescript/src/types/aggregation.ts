/**
 * Aggregation tree types for datafeed configurations.
 *
 * The tree mirrors the `aggregations` block a datafeed submits: every node is
 * owned by exactly one parent and nodes are never shared.
 */

/**
 * Fields shared by every aggregation node.
 */
interface AggregationNodeBase {
  /** Aggregation name as declared by the user */
  readonly name: string;
  /** Nested aggregations, in declaration order */
  readonly subAggregations: readonly AggregationNode[];
}

/**
 * Numeric histogram with a fixed bucket width.
 */
export interface HistogramAggregation extends AggregationNodeBase {
  readonly type: 'histogram';
  readonly field?: string;
  /** Bucket width, interpreted as milliseconds when the field is a timestamp */
  readonly interval: number;
}

/**
 * Date histogram with either a fixed or a calendar interval.
 */
export interface DateHistogramAggregation extends AggregationNodeBase {
  readonly type: 'date_histogram';
  readonly field?: string;
  /** Exact duration, e.g. "30s", "2h" */
  readonly fixedInterval?: string;
  /** Calendar unit ("day", "1w") or a duration literal */
  readonly calendarInterval?: string;
  readonly timeZone?: string;
}

/**
 * Composite aggregation bucketing on several value sources at once.
 */
export interface CompositeAggregation extends AggregationNodeBase {
  readonly type: 'composite';
  readonly sources: readonly CompositeValueSource[];
  readonly size?: number;
}

/**
 * Any aggregation type the interval extraction does not inspect
 * (terms, max, avg, bucket_script, ...).
 */
export interface OtherAggregation extends AggregationNodeBase {
  readonly type: 'other';
  /** The aggregation type key, e.g. "terms" */
  readonly kind: string;
  /** Raw definition body */
  readonly body: Readonly<Record<string, unknown>>;
}

export type AggregationNode =
  | HistogramAggregation
  | DateHistogramAggregation
  | CompositeAggregation
  | OtherAggregation;

export type AggregationType = AggregationNode['type'];

// ============================================================================
// Composite value sources
// ============================================================================

export interface DateHistogramValueSource {
  readonly type: 'date_histogram';
  readonly name: string;
  readonly field?: string;
  readonly fixedInterval?: string;
  readonly calendarInterval?: string;
  readonly timeZone?: string;
}

export interface TermsValueSource {
  readonly type: 'terms';
  readonly name: string;
  readonly field?: string;
}

export interface HistogramValueSource {
  readonly type: 'histogram';
  readonly name: string;
  readonly field?: string;
  readonly interval: number;
}

export interface GeoTileGridValueSource {
  readonly type: 'geotile_grid';
  readonly name: string;
  readonly field?: string;
  readonly precision?: number;
}

export type CompositeValueSource =
  | DateHistogramValueSource
  | TermsValueSource
  | HistogramValueSource
  | GeoTileGridValueSource;

// ============================================================================
// Date bucketing spec
// ============================================================================

/**
 * The interval-bearing fields shared by a date_histogram aggregation and a
 * composite date_histogram value source.
 */
export interface DateBucketSpec {
  readonly timeZone?: string;
  readonly fixedInterval?: string;
  readonly calendarInterval?: string;
}
