#!/usr/bin/env node
import { Command } from 'commander';

import { registerDbCommand } from './commands/db.js';
import { registerDownloadCommand } from './commands/download.js';
import { registerScanCommand } from './commands/scan.js';
import { errorMessage } from './lib/errors.js';

const program = new Command();

program
  .name('cdsfetch')
  .description('Download climate index datasets and keep a catalog of the files on disk')
  .option('--debug', 'log debug messages to the console', false);

registerDownloadCommand(program);
registerScanCommand(program);
registerDbCommand(program);

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`Error: ${errorMessage(e)}`);
  process.exitCode = 1;
});
