export {
  locateDateBucketAggregation,
  isDateBucketAggregation,
  isCompositeWithDateHistogramSource,
  dateHistogramSources,
  extractDateHistogramSource,
  type SourceExtractionOptions,
} from './locate.js';

export {
  intervalMillis,
  histogramIntervalMillis,
  validateAndResolveDateInterval,
  dateBucketSpecFromAggregation,
  dateBucketSpecFromComposite,
  type DateBucketOrigin,
} from './interval.js';

export { parseAggregations, aggregationNodeSchema } from './parser.js';
