export {
  parseTimestamp,
  truncateToSecond,
  formatOoxmlDate,
  parseOoxmlDate,
  formatDisplayTimestamp,
} from './timestamp';
