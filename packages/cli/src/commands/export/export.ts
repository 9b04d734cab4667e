import { Command } from 'commander';
import { ExportCommand } from './export-command';

/**
 * Register the export command
 */
export function registerExportCommand(program: Command): void {
  const exportCommand = new ExportCommand();
  exportCommand.register(program);
}
