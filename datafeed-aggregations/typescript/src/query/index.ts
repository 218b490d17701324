export {
  EPOCH_MILLIS_FORMAT,
  timeRangeQuery,
  wrapInTimeRangeQuery,
  assertTimeRange,
} from './range.js';
