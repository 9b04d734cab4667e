export { TransferModule, toArchiveRecord, ARCHIVE_EXTENSION, DEFAULT_MAX_ARCHIVE_BYTES } from './transfer';
export { TransferError } from './errors';
export type { TransferErrorCode } from './errors';
export type {
  TransferDependencies,
  ExportOptions,
  ExportResult,
  ImportOptions,
  ImportResult,
  ITransferModule,
} from './transfer.types';
