import { Command } from 'commander';
import { dirname, resolve } from 'node:path';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { formatCommand } from '../../lib/utils/format.js';
import { CredentialResolver } from '../../credentials/resolver.js';
import { listSteps, loadManifestFile, parseGroupList } from '../../registry/index.js';
import { MANIFEST_DEFAULTS, type Manifest, type ProvisioningStep } from '../../registry/types.js';
import { evaluateCondition } from '../../runner/index.js';

export interface PlannedStep {
  step: ProvisioningStep;
  will_run: boolean;
  reason: string | null;
}

export interface StepPlan {
  manifest: Manifest;
  steps: PlannedStep[];
}

export interface PlanStepsOptions {
  manifestFile: string;
  only?: readonly string[];
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

/** Load the manifest and evaluate every condition without running anything */
export function planSteps(options: PlanStepsOptions): StepPlan {
  const manifestFile = resolve(options.manifestFile);
  const manifest = loadManifestFile(manifestFile);
  const env = options.env ?? process.env;
  const envFile = options.envFile
    ? resolve(options.envFile)
    : resolve(dirname(manifestFile), manifest.env_file);
  const credentials = CredentialResolver.fromEnvFile(envFile, env);

  const steps = listSteps(manifest, { only: options.only }).map((step) => {
    const outcome = evaluateCondition(step.condition, { env, credentials });
    return { step, will_run: outcome.met, reason: outcome.reason };
  });

  return { manifest, steps };
}

export function printPlan(
  plan: StepPlan,
  options: { json?: boolean; write?: (line: string) => void } = {},
): void {
  const write = options.write ?? ((line: string) => console.log(line));

  if (options.json) {
    write(JSON.stringify({
      manifest: plan.manifest.name,
      steps: plan.steps.map(({ step, will_run, reason }) => ({
        name: step.name,
        group: step.group,
        command: step.command,
        idempotent: step.idempotent,
        optional: step.optional,
        will_run,
        reason,
      })),
    }));
    return;
  }

  write(`Manifest: ${chalk.bold(plan.manifest.name)}`);
  write(`  ${plan.steps.length} steps`);
  write('');

  let group: string | null = null;
  const nameWidth = Math.max(4, ...plan.steps.map((p) => p.step.name.length));
  for (const { step, will_run, reason } of plan.steps) {
    if (step.group !== group) {
      group = step.group;
      write(chalk.bold(`  ${group}`));
    }
    const icon = will_run ? chalk.green('○') : chalk.dim('⏭');
    const flags = [step.optional ? 'optional' : null, step.probe ? 'probed' : null].filter(Boolean);
    const suffix = flags.length > 0 ? chalk.dim(` [${flags.join(', ')}]`) : '';
    write(`    ${icon} ${step.name.padEnd(nameWidth)}  ${formatCommand(step.command)}${suffix}`);
    if (!will_run && reason) write(chalk.dim(`      skip: ${reason}`));
  }
}

export const listCommand = new Command('list')
  .description('List manifest steps in execution order')
  .option('-f, --file <path>', 'Path to manifest YAML file', MANIFEST_DEFAULTS.file)
  .option('--only <groups>', 'Comma-separated step groups to list')
  .option('--env-file <path>', 'Credential file (overrides the manifest env_file)')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (options: { file: string; only?: string; envFile?: string; json?: boolean }) => {
      const plan = planSteps({
        manifestFile: options.file,
        only: parseGroupList(options.only),
        envFile: options.envFile,
      });
      printPlan(plan, { json: options.json });
    }),
  );
