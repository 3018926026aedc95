#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from './commands/run/index.js';
import { listCommand } from './commands/list/index.js';
import { mergeSettingsCommand } from './commands/merge-settings/index.js';

const program = new Command();

program
  .name('devstrap')
  .description('Idempotent developer environment bootstrap')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(listCommand);
program.addCommand(mergeSettingsCommand);

await program.parseAsync();
