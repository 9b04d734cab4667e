import { Command } from 'commander';
import { ImportCommand } from './import-command';

/**
 * Register the import command
 */
export function registerImportCommand(program: Command): void {
  const importCommand = new ImportCommand();
  importCommand.register(program);
}
