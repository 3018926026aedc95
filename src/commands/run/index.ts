import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { runManifest } from '../../runner/index.js';
import { MANIFEST_DEFAULTS } from '../../registry/types.js';
import { parseGroupList } from '../../registry/index.js';
import { planSteps, printPlan } from '../list/index.js';

export function parseTimeout(value: string): number {
  const sec = Number(value);
  if (!Number.isFinite(sec) || sec < 1) {
    throw new InvalidArgumentError('timeout must be a number of seconds >= 1');
  }
  return sec;
}

export const runCommand = new Command('run')
  .description('Run the provisioning steps of a manifest')
  .option('-f, --file <path>', 'Path to manifest YAML file', MANIFEST_DEFAULTS.file)
  .option('--only <groups>', 'Comma-separated step groups to run (e.g. mcp)')
  .option('--env-file <path>', 'Credential file (overrides the manifest env_file)')
  .option('--fail-fast', 'Skip remaining steps after the first required failure')
  .option('--timeout <sec>', 'Default per-step timeout in seconds', parseTimeout)
  .option('--dry-run', 'Validate and show which steps would run, do not execute')
  .option('--json', 'Output result as JSON')
  .option('--verbose', 'Show commands and output of every step')
  .action(
    withErrorHandler(async (options: {
      file: string;
      only?: string;
      envFile?: string;
      failFast?: boolean;
      timeout?: number;
      dryRun?: boolean;
      json?: boolean;
      verbose?: boolean;
    }) => {
      const only = parseGroupList(options.only);

      // --dry-run: validate only
      if (options.dryRun) {
        const plan = planSteps({ manifestFile: options.file, only, envFile: options.envFile });
        printPlan(plan, { json: options.json });
        return;
      }

      const outcome = await runManifest({
        manifestFile: options.file,
        only,
        envFile: options.envFile,
        failFast: options.failFast,
        timeoutSec: options.timeout,
        reporter: { json: options.json, verbose: options.verbose },
        handleSignals: true,
      });

      if (outcome.interrupted && !options.json) {
        console.log(chalk.yellow('⚠ Run interrupted. Completed steps are safe to re-run.'));
      }
      process.exit(outcome.exitCode);
    }),
  );
