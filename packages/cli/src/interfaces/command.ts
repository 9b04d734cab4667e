/**
 * Standard Command Interface for the K7 CLI
 *
 * All commands implement this interface so they can be registered the
 * same way and tested with a mocked DependencyInjectionService.
 */

import type { Command } from 'commander';

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}
