export type {
  AggregationNode,
  AggregationType,
  HistogramAggregation,
  DateHistogramAggregation,
  CompositeAggregation,
  OtherAggregation,
  CompositeValueSource,
  DateHistogramValueSource,
  TermsValueSource,
  HistogramValueSource,
  GeoTileGridValueSource,
  DateBucketSpec,
} from './aggregation.js';

export type {
  QueryDSL,
  MatchAllQuery,
  MatchQuery,
  TermQuery,
  TermsQuery,
  ExistsQuery,
  RangeBounds,
  RangeQuery,
  BoolQuery,
  TimeRangeFilterQuery,
} from './query.js';
