import type { Logger } from '../logger';
import type { RunLogStore } from '../run_log_store';

export type LogSeverity =
  | 'INFO'
  | 'WARNING'
  | 'ERROR'
  | 'SUCCESS'
  | 'INFO_IMPORTANT'
  | 'INFO_DETAIL';

export const LOG_SEVERITIES: readonly LogSeverity[] = [
  'INFO',
  'WARNING',
  'ERROR',
  'SUCCESS',
  'INFO_IMPORTANT',
  'INFO_DETAIL',
];

export type LogEntry = {
  /** ISO 8601 */
  timestamp: string;
  severity: LogSeverity;
  message: string;
};

/**
 * Anything entries can be appended to. Codec and reconciler depend on this,
 * not on OperationLog itself.
 */
export interface LogSink {
  append(message: string, severity?: LogSeverity): void;
}

export type LogFormat = 'text' | 'html';

/** Shape written by persistLast. */
export type PersistedRunLog = {
  savedAt: string;
  expiresAt: string;
  entries: LogEntry[];
};

export type OperationLogOptions = {
  store: RunLogStore;
  /** Entries are mirrored here as they are appended */
  logger?: Logger;
  clock?: () => Date;
  /** Lifetime of the persisted log, default 3600 */
  ttlSeconds?: number;
};
