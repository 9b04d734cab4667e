#!/usr/bin/env node

import { Command } from 'commander';
import { registerExportCommand } from './commands/export/export';
import { registerImportCommand } from './commands/import/import';
import { registerLogCommand } from './commands/log/log';

const program = new Command();

program
  .name('k7')
  .description('Encrypted account archive: export, import and inspect runs')
  .version('1.0.0');

registerExportCommand(program);
registerImportCommand(program);
registerLogCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
