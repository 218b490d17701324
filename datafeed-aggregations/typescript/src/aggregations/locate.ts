/**
 * Locating the date bucketing aggregation in a datafeed's aggregation tree.
 * @module aggregations/locate
 */

import { ConfigurationError } from '../errors/categories.js';
import { Messages } from '../errors/messages.js';
import type {
  AggregationNode,
  CompositeAggregation,
  DateHistogramValueSource,
} from '../types/aggregation.js';

export interface SourceExtractionOptions {
  /** Reject composites declaring more than one date_histogram source */
  strictCompositeSources?: boolean;
}

/**
 * Finds the date bucketing aggregation in a datafeed's aggregations.
 *
 * Every level of the tree down to the bucketing aggregation must hold exactly
 * one aggregation; the search descends through non-bucketing wrappers.
 *
 * @param aggregations - Top-level aggregations, in declaration order
 * @throws {ConfigurationError} If a level is empty or has siblings
 */
export function locateDateBucketAggregation(
  aggregations: readonly AggregationNode[]
): AggregationNode {
  let level = aggregations;
  const path: string[] = [];

  for (;;) {
    if (level.length === 0) {
      throw new ConfigurationError(Messages.REQUIRES_DATE_BUCKETING, { path });
    }
    if (level.length !== 1) {
      throw new ConfigurationError(Messages.NO_SIBLINGS, {
        path,
        aggregations: level.map((agg) => agg.name),
      });
    }

    const agg = level[0];
    if (isDateBucketAggregation(agg)) {
      return agg;
    }
    path.push(agg.name);
    level = agg.subAggregations;
  }
}

/**
 * Whether the node is a histogram, a date_histogram, or a composite with at
 * least one date_histogram value source.
 */
export function isDateBucketAggregation(node: AggregationNode): boolean {
  switch (node.type) {
    case 'histogram':
    case 'date_histogram':
      return true;
    case 'composite':
      return isCompositeWithDateHistogramSource(node);
    case 'other':
      return false;
  }
}

export function isCompositeWithDateHistogramSource(node: CompositeAggregation): boolean {
  return node.sources.some((source) => source.type === 'date_histogram');
}

/**
 * All date_histogram value sources of a composite, in declaration order.
 */
export function dateHistogramSources(
  composite: CompositeAggregation
): DateHistogramValueSource[] {
  const found: DateHistogramValueSource[] = [];
  for (const source of composite.sources) {
    if (source.type === 'date_histogram') {
      found.push(source);
    }
  }
  return found;
}

/**
 * Returns the first date_histogram value source of a composite aggregation.
 *
 * @throws {ConfigurationError} If there is none, or more than one in strict mode
 */
export function extractDateHistogramSource(
  composite: CompositeAggregation,
  options: SourceExtractionOptions = {}
): DateHistogramValueSource {
  const sources = dateHistogramSources(composite);
  const [first] = sources;

  if (first === undefined) {
    throw new ConfigurationError(Messages.COMPOSITE_REQUIRES_ONE_DATE_SOURCE, {
      aggregation: composite.name,
    });
  }
  if (options.strictCompositeSources && sources.length > 1) {
    throw new ConfigurationError(Messages.COMPOSITE_REQUIRES_ONE_DATE_SOURCE, {
      aggregation: composite.name,
      sources: sources.map((source) => source.name),
    });
  }
  return first;
}
