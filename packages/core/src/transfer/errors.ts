import type { LogEntry } from '../operation_log';

export type TransferErrorCode =
  | 'MISSING_PASSWORD'
  | 'EMPTY_ARCHIVE'
  | 'INVALID_FILE_TYPE'
  | 'FILE_TOO_LARGE'
  | 'ARCHIVE_UNREADABLE'
  | 'EXPORT_FAILED';

/**
 * The single terminal error of an export or import run.
 *
 * `entries` is the run log up to the failure; it has already been persisted
 * when the error is thrown. The underlying error, if any, is the `cause`.
 */
export class TransferError extends Error {
  public readonly entries: LogEntry[];

  constructor(
    message: string,
    public readonly code: TransferErrorCode,
    options: { cause?: unknown; entries?: LogEntry[] } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TransferError';
    this.entries = options.entries ?? [];
    Object.setPrototypeOf(this, TransferError.prototype);
  }
}
