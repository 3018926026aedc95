import { dirname, resolve } from 'node:path';
import { CredentialResolver } from '../credentials/resolver.js';
import { loadManifestFile } from '../registry/parser.js';
import { listSteps } from '../registry/index.js';
import type { Manifest, ProvisioningStep } from '../registry/types.js';
import { ConsoleReporter, exitCodeFor, type ReporterOptions } from '../report/reporter.js';
import { Executor } from './executor.js';
import { EXIT_INTERRUPTED, installShutdownHandlers, isShuttingDown, setCurrentAbort } from './shutdown.js';
import type { CommandRunner, StepResult } from './types.js';

export interface RunManifestOptions {
  manifestFile: string;
  only?: readonly string[];
  /** Overrides the manifest's env_file; relative to the current directory */
  envFile?: string;
  /** Overrides the manifest's fail_fast */
  failFast?: boolean;
  /** Overrides the manifest's timeout_sec */
  timeoutSec?: number;
  env?: NodeJS.ProcessEnv;
  /** Working directory for steps; defaults to the manifest's directory */
  cwd?: string;
  runCommand?: CommandRunner;
  reporter?: ReporterOptions;
  /** Install SIGINT handlers (the CLI does, tests do not) */
  handleSignals?: boolean;
}

export interface RunManifestResult {
  manifest: Manifest;
  steps: ProvisioningStep[];
  results: StepResult[];
  interrupted: boolean;
  exitCode: number;
}

/**
 * Load a manifest, resolve credentials and run the selected steps.
 * Configuration errors throw before any step starts.
 */
export async function runManifest(options: RunManifestOptions): Promise<RunManifestResult> {
  const manifestFile = resolve(options.manifestFile);
  const manifest = loadManifestFile(manifestFile);
  const steps = listSteps(manifest, { only: options.only });
  const cwd = options.cwd ?? dirname(manifestFile);
  const env = options.env ?? process.env;

  // --env-file is relative to the shell; the manifest's env_file to the manifest
  const envFile = options.envFile
    ? resolve(options.envFile)
    : resolve(dirname(manifestFile), manifest.env_file);
  const credentials = CredentialResolver.fromEnvFile(envFile, env);

  if (options.handleSignals) installShutdownHandlers();

  const reporter = new ConsoleReporter(options.reporter);
  const executor = new Executor({
    credentials,
    env,
    cwd,
    runCommand: options.runCommand,
    failFast: options.failFast ?? manifest.fail_fast,
    timeoutSec: options.timeoutSec ?? manifest.timeout_sec,
    listener: reporter,
    shouldStop: options.handleSignals ? isShuttingDown : undefined,
    onAbortable: options.handleSignals ? setCurrentAbort : undefined,
  });

  const results = await executor.run(steps);
  reporter.printSummary(manifest.name, results);

  const interrupted = options.handleSignals === true && isShuttingDown();
  return {
    manifest,
    steps,
    results,
    interrupted,
    exitCode: interrupted ? EXIT_INTERRUPTED : exitCodeFor(results),
  };
}
