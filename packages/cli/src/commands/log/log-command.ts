import { Command } from 'commander';
import { OperationLog } from '@k7/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Log Command Options
 */
export interface LogCommandOptions extends BaseCommandOptions {
  /** text (default) or html */
  format?: string;
}

export const NO_LOG_MESSAGE = 'No run log available. It was never recorded or has expired.';

/**
 * Log Command - shows the persisted log of the last export or import
 */
export class LogCommand extends BaseCommand<LogCommandOptions> {
  protected commandName = 'log';
  protected description = 'Show the log of the last export or import run';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('-f, --format <type>', 'Output format (text|html)', 'text')
      .option('--json', 'Output results in JSON format')
      .option('--verbose', 'Enable verbose output with detailed information')
      .option('--quiet', 'Suppress non-essential output')
      .action(async (options: LogCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: LogCommandOptions): Promise<void> {
    const format = options.format ?? 'text';
    if (!isLogFormat(format)) {
      this.handleError(`Unknown format "${format}". Use text or html.`, options);
      return;
    }

    try {
      const operationLog = await this.dependencyService.getOperationLog();
      const rendered = await operationLog.formattedLast(format);

      if (options.json) {
        this.handleSuccess({ format, available: rendered !== '', log: rendered }, options);
        return;
      }
      if (rendered === '') {
        if (!options.quiet) {
          console.log(`ℹ️  ${NO_LOG_MESSAGE}`);
        }
        return;
      }
      console.log(rendered);
    } catch (error) {
      this.handleError(this.describeFailure(error), options, error instanceof Error ? error : undefined);
    }
  }
}

function isLogFormat(value: string): value is OperationLog.LogFormat {
  return value === 'text' || value === 'html';
}
