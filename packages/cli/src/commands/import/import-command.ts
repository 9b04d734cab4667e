import { Command } from 'commander';
import * as path from 'path';
import { promises as fs } from 'fs';
import type { Transfer } from '@k7/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Import Command Options
 */
export interface ImportCommandOptions extends BaseCommandOptions {
  /** Report what would change without writing to the account store */
  dryRun?: boolean;
  /** Overrides K7_ENCRYPTION_PASSWORD and the configured password */
  password?: string;
}

/**
 * Import Command - reconciles a `.k7` archive into the account store
 *
 * Reads the file, hands it to TransferModule.importArchive and prints the
 * summary with the run log. Only the file's base name is passed on, for
 * the extension check.
 */
export class ImportCommand extends BaseCommand<ImportCommandOptions> {
  protected commandName = 'import';
  protected description = 'Import accounts from an encrypted .k7 archive';

  register(program: Command): void {
    program
      .command(`${this.commandName} <file>`)
      .description(this.description)
      .option('--dry-run', 'Show what would be created or updated without writing')
      .option('--password <password>', 'Encryption password (overrides configuration)')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Include detail entries of the run log')
      .option('--quiet', 'Suppress non-essential output')
      .action(async (file: string, options: ImportCommandOptions) => {
        await this.execute(file, options);
      });
  }

  async execute(file: string, options: ImportCommandOptions): Promise<void> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(file);
    } catch (error) {
      this.handleError(`Cannot read archive file: ${file}`, options, error instanceof Error ? error : undefined);
      return;
    }

    try {
      const configManager = this.dependencyService.getConfigManager();
      const password = options.password ?? await configManager.getEncryptionPassword();
      const transfer = await this.dependencyService.getTransferModule();

      const result = await transfer.importArchive({
        bytes,
        password,
        dryRun: options.dryRun ?? false,
        filename: path.basename(file),
      });

      if (options.json) {
        this.handleSuccess({
          dryRun: result.dryRun,
          summary: result.summary,
          decisions: result.decisions,
          issues: result.issues,
          entries: result.entries,
        }, options);
        return;
      }

      if (!options.quiet) {
        console.log(this.formatRunLog(result.entries, options));
      }
      this.handleSuccess(undefined, options, formatSummary(result));
    } catch (error) {
      this.handleError(this.describeFailure(error), options, error instanceof Error ? error : undefined);
    }
  }
}

export function formatSummary(result: Transfer.ImportResult): string {
  const { created, updated, skipped } = result.summary;
  const counts = `created ${created}, updated ${updated}, skipped ${skipped}`;
  return result.dryRun ? `Dry run finished: ${counts} (nothing written)` : `Import finished: ${counts}`;
}
