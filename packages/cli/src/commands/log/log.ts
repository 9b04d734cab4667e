import { Command } from 'commander';
import { LogCommand } from './log-command';

/**
 * Register the log command
 */
export function registerLogCommand(program: Command): void {
  const logCommand = new LogCommand();
  logCommand.register(program);
}
