import { Command } from 'commander';
import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { DevstrapError, ErrorCode } from '../../lib/errors.js';
import {
  DEFAULT_SETTINGS_OUTPUT,
  findSettingsFiles,
  mergePermissions,
  updateSettingsFile,
} from '../../settings/merge.js';

export const mergeSettingsCommand = new Command('merge-settings')
  .description('Merge permissions.allow from every .claude/settings.local.json into one settings file')
  .argument('[directory]', 'Directory to search for settings files', '.')
  .option('-o, --output <path>', 'Output settings file', DEFAULT_SETTINGS_OUTPUT)
  .option('-v, --verbose', 'List every merged permission')
  .action(
    withErrorHandler(async (directory: string, options: { output: string; verbose?: boolean }) => {
      const root = resolve(directory);
      const output = resolve(options.output);

      if (!existsSync(root) || !statSync(root).isDirectory()) {
        throw new DevstrapError(
          ErrorCode.SETTINGS_NOT_FOUND,
          `not a directory: ${root}`,
          'Run: devstrap merge-settings <directory>',
        );
      }

      console.log(`🔍 Searching for .claude/settings.local.json files in: ${root}`);
      console.log('-'.repeat(60));

      const files = findSettingsFiles(root);
      if (files.length === 0) {
        console.log(chalk.yellow('⚠ No .claude/settings.local.json files found'));
        return;
      }
      console.log(`📁 Found ${files.length} settings file(s):`);

      const merged = mergePermissions(files, root);
      if (merged.size === 0) {
        console.log(chalk.yellow('\n⚠ No permissions found to merge'));
        return;
      }
      console.log(`\n📊 Total unique permissions found: ${merged.size}`);

      if (options.verbose) {
        console.log('\n📋 Merged permissions list:');
        for (const permission of [...merged].sort()) {
          console.log(`  • ${permission}`);
        }
      }

      const result = updateSettingsFile(output, merged);
      console.log(
        result.added.length > 0
          ? `\n🆕 Added ${result.added.length} new permissions`
          : '\n✔ No new permissions to add (all already exist)',
      );
      console.log(chalk.green(`✓ Updated settings in: ${result.output}`));
      console.log(`  Total unique permissions: ${result.total}`);
      console.log(chalk.dim(`  Files processed: ${files.length}`));
    }),
  );
