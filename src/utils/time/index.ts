export {
  TIMESTAMP_LENGTH,
  formatDate,
  formatTime,
  formatTimestamp,
  isEncodableTimestamp,
  parseTimestamp,
  truncateToSecond
} from './timestamp';
