export {
  generateTimeline,
  generateRandomIntervals,
  randomIntInclusive,
  assertValidInterval,
  DEFAULT_AUTHOR,
  DEFAULT_INTERVAL_CONFIG,
  type IntervalConfig,
  type TimelineOptions,
} from './timeline-generator';
