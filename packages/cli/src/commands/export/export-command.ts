import { Command } from 'commander';
import * as path from 'path';
import { promises as fs } from 'fs';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Export Command Options
 */
export interface ExportCommandOptions extends BaseCommandOptions {
  /** Target file or directory (default: working directory) */
  output?: string;
  /** Overrides K7_ENCRYPTION_PASSWORD and the configured password */
  password?: string;
}

/**
 * Export Command - writes every stored account to an encrypted `.k7` archive
 *
 * Thin wrapper around TransferModule.exportArchive: resolves the password,
 * picks the output path and reports the run.
 */
export class ExportCommand extends BaseCommand<ExportCommandOptions> {
  protected commandName = 'export';
  protected description = 'Export all accounts to an encrypted .k7 archive';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('-o, --output <path>', 'File or directory to write the archive to')
      .option('--password <password>', 'Encryption password (overrides configuration)')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Include detail entries of the run log')
      .option('--quiet', 'Suppress non-essential output')
      .action(async (options: ExportCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: ExportCommandOptions): Promise<void> {
    try {
      const configManager = this.dependencyService.getConfigManager();
      const password = options.password ?? await configManager.getEncryptionPassword();
      const transfer = await this.dependencyService.getTransferModule();

      const result = await transfer.exportArchive({ password });
      const target = await resolveOutputPath(options.output, result.filename);
      await fs.writeFile(target, result.bytes);

      if (options.json) {
        this.handleSuccess({
          file: target,
          recordCount: result.recordCount,
          entries: result.entries,
        }, options);
        return;
      }

      if (!options.quiet) {
        console.log(this.formatRunLog(result.entries, options));
      }
      this.handleSuccess(undefined, options, `Exported ${result.recordCount} account(s) to ${target}`);
    } catch (error) {
      this.handleError(this.describeFailure(error), options, error instanceof Error ? error : undefined);
    }
  }
}

/**
 * A missing path or an existing directory receives the generated filename.
 */
export async function resolveOutputPath(output: string | undefined, filename: string): Promise<string> {
  if (!output) {
    return path.resolve(process.cwd(), filename);
  }
  try {
    const stats = await fs.stat(output);
    if (stats.isDirectory()) {
      return path.resolve(output, filename);
    }
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
  return path.resolve(output);
}

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}
