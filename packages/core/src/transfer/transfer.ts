import * as path from 'path';
import type { AccountStore, StoredAccount } from '../account_store';
import { DEFAULT_ROLE_METADATA_KEY } from '../account_store';
import { ArchiveCodec } from '../archive_codec';
import type { OpenedArchive } from '../archive_codec';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { OperationLog } from '../operation_log';
import { Reconciler } from '../reconciler';
import type { ArchiveRecord } from '../record_types';
import { formatFileStamp } from '../utils';
import { TransferError } from './errors';
import type { TransferErrorCode } from './errors';
import type {
  ExportOptions,
  ExportResult,
  ITransferModule,
  ImportOptions,
  ImportResult,
  TransferDependencies,
} from './transfer.types';

export const ARCHIVE_EXTENSION = 'k7';
export const DEFAULT_MAX_ARCHIVE_BYTES = 5 * 1024 * 1024;

/**
 * TransferModule - export and import runs
 *
 * Export: store.list → archive records → ArchiveCodec.seal → bytes + filename
 * Import: input gate → ArchiveCodec.open → Reconciler.apply → summary
 *
 * Each run clears the OperationLog first and persists it last, on success
 * and on failure alike; a log that cannot be saved becomes a WARNING entry.
 * A run either returns its full result or throws one TransferError carrying
 * the log so far; no partial archive is returned.
 *
 * @example
 * ```typescript
 * const transfer = new TransferModule({ store, log });
 * const { bytes, filename } = await transfer.exportArchive({ password: 'test-secret' });
 * const result = await transfer.importArchive({ bytes, password: 'test-secret', dryRun: true });
 * ```
 */
export class TransferModule implements ITransferModule {
  private readonly store: AccountStore;
  private readonly log: OperationLog;
  private readonly codec: ArchiveCodec;
  private readonly reconciler: Reconciler;
  private readonly maxArchiveBytes: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(dependencies: TransferDependencies) {
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.codec = dependencies.codec ?? new ArchiveCodec();
    this.maxArchiveBytes = dependencies.maxArchiveBytes ?? DEFAULT_MAX_ARCHIVE_BYTES;
    this.clock = dependencies.clock ?? (() => new Date());
    this.logger = dependencies.logger ?? createLogger('[Transfer] ');

    this.reconciler = new Reconciler({
      store: this.store,
      log: this.log,
      roleMetadataKey: dependencies.roleMetadataKey ?? DEFAULT_ROLE_METADATA_KEY,
      clock: this.clock,
      logger: dependencies.logger,
    });
  }

  async exportArchive(options: ExportOptions): Promise<ExportResult> {
    this.log.clear();
    this.log.append('Account export started.', 'INFO_IMPORTANT');

    const password = options.password;
    if (!password) {
      return this.fail('MISSING_PASSWORD', 'Encryption password is not set; cannot export.');
    }

    let accounts: StoredAccount[];
    try {
      accounts = await this.store.list();
    } catch (error) {
      return this.fail('EXPORT_FAILED', `Could not read accounts: ${describe(error)}`, error);
    }

    if (accounts.length === 0) {
      this.log.append('No accounts found to export; the archive will be empty.', 'WARNING');
    } else {
      this.log.append(`Fetched data for ${accounts.length} account(s).`, 'INFO');
    }

    const records = accounts.map(toArchiveRecord);
    let bytes: Buffer;
    try {
      bytes = this.codec.seal(records, password, this.log);
    } catch (error) {
      return this.fail('EXPORT_FAILED', `Could not create the archive: ${describe(error)}`, error);
    }

    const filename = `accounts_${formatFileStamp(this.clock())}.${ARCHIVE_EXTENSION}`;
    this.log.append(`Export complete: ${records.length} account(s) written to ${filename}.`, 'SUCCESS');
    await this.persistLog();
    this.logger.debug(`Exported ${records.length} account(s) as ${filename} (${bytes.length} bytes)`);

    return { bytes, filename, recordCount: records.length, entries: this.log.entries() };
  }

  async importArchive(options: ImportOptions): Promise<ImportResult> {
    const dryRun = options.dryRun ?? false;
    this.log.clear();
    this.log.append(dryRun ? 'Account import started (dry run).' : 'Account import started.', 'INFO_IMPORTANT');

    const password = options.password;
    if (!password) {
      return this.fail('MISSING_PASSWORD', 'Encryption password is not set; cannot decrypt the archive.');
    }

    if (options.filename !== undefined) {
      const extension = path.extname(options.filename).replace(/^\./, '').toLowerCase();
      if (extension !== ARCHIVE_EXTENSION) {
        const shown = extension === '' ? '(none)' : `.${extension}`;
        return this.fail('INVALID_FILE_TYPE', `Invalid file type ${shown}; expected .${ARCHIVE_EXTENSION}.`);
      }
    }

    if (options.bytes.length > this.maxArchiveBytes) {
      return this.fail(
        'FILE_TOO_LARGE',
        `Archive is too large: ${options.bytes.length} bytes, maximum ${this.maxArchiveBytes}.`
      );
    }

    if (options.bytes.toString('utf8').trim() === '') {
      return this.fail('EMPTY_ARCHIVE', 'The archive is empty.');
    }

    const label = options.filename !== undefined ? `"${options.filename}"` : 'Archive';
    this.log.append(`${label} received for import (${options.bytes.length} bytes).`, 'INFO');

    let opened: OpenedArchive;
    try {
      opened = this.codec.openWithReport(options.bytes, password, this.log);
    } catch (error) {
      return this.fail(
        'ARCHIVE_UNREADABLE',
        `Could not read the archive. Check the password and that the file is a K7 archive. (${describe(error)})`,
        error
      );
    }

    for (const issue of opened.issues) {
      this.log.append(`Entry #${issue.index + 1}: ${issue.field} ${issue.message}.`, 'WARNING');
    }
    if (dryRun) {
      this.log.append('Dry run: no changes will be written.', 'INFO_IMPORTANT');
    }

    const { summary, decisions } = await this.reconciler.apply(opened.records, { dryRun });

    const counts = `Created: ${summary.created}, updated: ${summary.updated}, skipped: ${summary.skipped}.`;
    this.log.append(
      dryRun ? `Dry run complete, no changes were made. ${counts}` : `Import complete. ${counts}`,
      'SUCCESS'
    );
    await this.persistLog();
    this.logger.debug(`Import finished: ${counts}`);

    return { summary, decisions, issues: opened.issues, entries: this.log.entries(), dryRun };
  }

  /**
   * A run log that cannot be saved never replaces the run's own outcome.
   */
  private async persistLog(): Promise<void> {
    try {
      await this.log.persistLast();
    } catch (error) {
      this.logger.error(`Could not save the run log: ${describe(error)}`);
      this.log.append(`Could not save the run log: ${describe(error)}`, 'WARNING');
    }
  }

  /**
   * Logs the failure, persists the log and throws.
   */
  private async fail(code: TransferErrorCode, message: string, cause?: unknown): Promise<never> {
    this.log.append(message, 'ERROR');
    await this.persistLog();
    throw new TransferError(message, code, { cause, entries: this.log.entries() });
  }
}

/**
 * Store account → archive record. Empty profile columns are kept as `''`;
 * an empty credential hash is left out.
 */
export function toArchiveRecord(account: StoredAccount): ArchiveRecord {
  const record: ArchiveRecord = {
    key: account.key,
    attributes: {
      email: account.email,
      url: account.url,
      niceKey: account.niceKey,
      displayName: account.displayName,
      firstName: account.firstName,
      lastName: account.lastName,
      description: account.description,
      registeredAt: account.registeredAt,
      extra: {},
    },
    metadata: { ...account.metadata },
  };
  if (account.credentialHash !== '') {
    record.credentialHash = account.credentialHash;
  }
  return record;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
