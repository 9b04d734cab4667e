/**
 * Base Command Class for the K7 CLI
 *
 * Provides consistent success/error output (text or `--json`) and access to
 * the dependency injection service.
 */

import type { Command } from 'commander';
import { OperationLog, Transfer } from '@k7/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else {
      if (message && !isQuiet) {
        console.log(`✅ ${message}`);
      }
      if (typeof data === 'string' && data !== '' && !isQuiet) {
        console.log(data);
      }
    }
  }

  /**
   * Renders run log entries as text lines. INFO_DETAIL entries only show
   * under `--verbose`.
   */
  protected formatRunLog(entries: readonly OperationLog.LogEntry[], options: TOptions): string {
    const visible = options.verbose
      ? entries
      : entries.filter(entry => entry.severity !== 'INFO_DETAIL');
    return OperationLog.formatEntries(visible, 'text');
  }

  /**
   * User-facing message for a failed run; transfer failures carry their code.
   */
  protected describeFailure(error: unknown): string {
    if (error instanceof Transfer.TransferError) {
      return `${error.message} (${error.code})`;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
