export { formatDateTime, formatFileStamp, formatIsoTimestamp } from './time_format';
