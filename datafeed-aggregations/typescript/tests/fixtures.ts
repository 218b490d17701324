/**
 * Test fixtures for datafeed aggregation trees.
 */

import type {
  AggregationNode,
  CompositeAggregation,
  CompositeValueSource,
  DateHistogramAggregation,
  HistogramAggregation,
  OtherAggregation,
} from "../src/types/index.js";

export function dateHistogram(
  name: string,
  spec: Partial<Omit<DateHistogramAggregation, "type" | "name">> = {}
): DateHistogramAggregation {
  return {
    type: "date_histogram",
    name,
    field: "timestamp",
    subAggregations: [],
    ...spec,
  };
}

export function histogram(
  name: string,
  interval: number,
  subAggregations: AggregationNode[] = []
): HistogramAggregation {
  return { type: "histogram", name, field: "timestamp", interval, subAggregations };
}

export function composite(
  name: string,
  sources: CompositeValueSource[],
  subAggregations: AggregationNode[] = []
): CompositeAggregation {
  return { type: "composite", name, sources, subAggregations };
}

export function other(
  name: string,
  kind: string,
  subAggregations: AggregationNode[] = []
): OtherAggregation {
  return { type: "other", name, kind, body: { field: "value" }, subAggregations };
}

export function termsSource(name: string): CompositeValueSource {
  return { type: "terms", name, field: name };
}

export function dateSource(
  name: string,
  spec: { fixedInterval?: string; calendarInterval?: string; timeZone?: string }
): CompositeValueSource {
  return { type: "date_histogram", name, field: "timestamp", ...spec };
}

/**
 * Runs fn and returns what it threw, or undefined.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
