export {
  OperationLog,
  DEFAULT_LOG_TTL_SECONDS,
  formatEntries,
  formatLine,
  escapeControlCharacters,
  escapeHtml,
} from './operation_log';
export { LOG_SEVERITIES } from './operation_log.types';
export type {
  LogSeverity,
  LogEntry,
  LogSink,
  LogFormat,
  PersistedRunLog,
  OperationLogOptions,
} from './operation_log.types';
