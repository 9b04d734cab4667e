import type { AccountStore } from '../account_store';
import type { ArchiveCodec } from '../archive_codec';
import type { Logger } from '../logger';
import type { LogEntry, OperationLog } from '../operation_log';
import type { Decision, ReconcileSummary } from '../reconciler';
import type { RecordIssue } from '../record_types';

export type TransferDependencies = {
  store: AccountStore;
  /** Owned by the module for the length of each run: cleared at start, persisted at the end */
  log: OperationLog;
  codec?: ArchiveCodec;
  /** Metadata key holding the role set, default `capabilities` */
  roleMetadataKey?: string;
  /** Largest accepted archive, default 5 MiB */
  maxArchiveBytes?: number;
  clock?: () => Date;
  logger?: Logger;
};

export type ExportOptions = {
  /** Missing or empty fails the run with MISSING_PASSWORD */
  password: string | null | undefined;
};

export type ExportResult = {
  /** ASCII base64 archive text */
  bytes: Buffer;
  /** `accounts_YYYYMMDD_HHMMSS.k7` */
  filename: string;
  recordCount: number;
  entries: LogEntry[];
};

export type ImportOptions = {
  bytes: Buffer;
  password: string | null | undefined;
  dryRun?: boolean;
  /** Original file name; when given its extension must be `.k7` */
  filename?: string;
};

export type ImportResult = {
  summary: ReconcileSummary;
  decisions: Decision[];
  /** Schema issues found while reading the archive */
  issues: RecordIssue[];
  entries: LogEntry[];
  dryRun: boolean;
};

export interface ITransferModule {
  exportArchive(options: ExportOptions): Promise<ExportResult>;
  importArchive(options: ImportOptions): Promise<ImportResult>;
}
