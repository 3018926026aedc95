import { resolve } from 'node:path';
import type { CredentialResolver } from '../credentials/resolver.js';
import { ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { formatCommand } from '../lib/utils/format.js';
import { maskSecrets } from '../lib/utils/mask.js';
import { expandVariables, type VariableRef, type VariableSource } from '../registry/parser.js';
import type { ProvisioningStep } from '../registry/types.js';
import { evaluateCondition } from './conditions.js';
import { spawnCommand } from './process.js';
import {
  EXIT_COMMAND_NOT_FOUND,
  type CommandOutcome,
  type CommandRunner,
  type RunListener,
  type StepErrorCode,
  type StepResult,
} from './types.js';

export interface ExecutorOptions {
  credentials: CredentialResolver;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  runCommand?: CommandRunner;
  /** Skip every remaining step after the first required failure */
  failFast?: boolean;
  /** Default per-step timeout; unset waits forever */
  timeoutSec?: number;
  listener?: RunListener;
  /** Polled before each step; true skips the rest of the run */
  shouldStop?: () => boolean;
  /** Receives each running step's AbortController, then null once it settles */
  onAbortable?: (controller: AbortController | null) => void;
}

interface ExpandedStep {
  argv: string[];
  probe: string[] | null;
  cwd: string;
  env: NodeJS.ProcessEnv;
  secrets: string[];
  unresolved: VariableRef[];
}

/**
 * Runs provisioning steps strictly one at a time, in registry order.
 * A failed step never stops the run unless failFast is set; every step
 * yields exactly one StepResult.
 */
export class Executor {
  private readonly env: NodeJS.ProcessEnv;
  private readonly cwd: string;
  private readonly runCommand: CommandRunner;

  constructor(private readonly options: ExecutorOptions) {
    this.env = options.env ?? process.env;
    this.cwd = options.cwd ?? process.cwd();
    this.runCommand = options.runCommand ?? spawnCommand;
  }

  async run(steps: readonly ProvisioningStep[]): Promise<StepResult[]> {
    const results: StepResult[] = [];
    const { listener } = this.options;
    let haltReason: string | null = null;

    for (let i = 0; i < steps.length; i++) {
      const step = steps[i]!;

      if (!haltReason && this.options.shouldStop?.()) {
        haltReason = 'not run: interrupted';
      }

      listener?.onStepStart?.(step, i, steps.length);

      const result = haltReason
        ? this.skipped(step, haltReason)
        : await this.runStep(step);

      debug('executor', `${step.name} → ${result.status}`, result.reason ?? '');
      results.push(result);
      listener?.onStepResult?.(result, step, i, steps.length);

      if (!haltReason && this.options.failFast && result.status === 'failed' && !step.optional) {
        haltReason = `not run: step "${step.name}" failed`;
      }
    }

    return results;
  }

  private async runStep(step: ProvisioningStep): Promise<StepResult> {
    const start = Date.now();

    const condition = evaluateCondition(step.condition, {
      env: this.env,
      credentials: this.options.credentials,
    });
    if (!condition.met) {
      return this.skipped(step, condition.reason);
    }

    const expanded = this.expand(step);
    if (expanded.unresolved.length > 0) {
      const names = expanded.unresolved.map((v) => `${v.source}.${v.name}`).join(', ');
      return this.failed(step, {
        command: formatCommand(step.command),
        reason: `unresolved variable: ${names}`,
        error_code: ErrorCode.UNRESOLVED_VARIABLE,
        duration_ms: Date.now() - start,
      });
    }

    const command = formatCommand(expanded.argv.map((arg) => maskSecrets(arg, expanded.secrets)));
    const timeoutSec = step.timeout_sec ?? this.options.timeoutSec;
    const timeout_ms = timeoutSec !== undefined ? timeoutSec * 1000 : undefined;

    if (expanded.probe) {
      const probe = await this.spawn(expanded.probe, expanded, timeout_ms);
      if (probe.exit_code === 0) {
        return {
          ...this.base(step, command),
          status: 'success',
          output: maskSecrets(probe.output, expanded.secrets),
          duration_ms: Date.now() - start,
          already_applied: true,
          reason: 'already applied',
        };
      }
      if (probe.error === 'aborted') {
        return this.failed(step, {
          command,
          output: maskSecrets(probe.output, expanded.secrets),
          duration_ms: Date.now() - start,
          reason: 'aborted',
          error_code: ErrorCode.STEP_FAILED,
        });
      }
      debug('executor', `${step.name}: probe exited ${probe.exit_code ?? probe.error ?? '?'}`);
    }

    const outcome = await this.spawn(expanded.argv, expanded, timeout_ms);
    const output = maskSecrets(outcome.output, expanded.secrets);
    const duration_ms = Date.now() - start;

    if (outcome.exit_code === 0) {
      return { ...this.base(step, command), status: 'success', exit_code: 0, output, duration_ms };
    }

    return this.failed(step, {
      command,
      output,
      duration_ms,
      exit_code: outcome.exit_code,
      ...describeFailure(outcome, timeoutSec),
    });
  }

  private async spawn(
    argv: string[],
    expanded: ExpandedStep,
    timeout_ms: number | undefined,
  ): Promise<CommandOutcome> {
    const [program, ...args] = argv;
    const controller = new AbortController();
    this.options.onAbortable?.(controller);
    try {
      const outcome = await this.runCommand({
        program: program!,
        args,
        cwd: expanded.cwd,
        env: expanded.env,
        timeout_ms,
        signal: controller.signal,
      });
      return controller.signal.aborted ? { ...outcome, exit_code: null, error: 'aborted' } : outcome;
    } finally {
      this.options.onAbortable?.(null);
    }
  }

  private expand(step: ProvisioningStep): ExpandedStep {
    const secrets: string[] = [];
    const unresolved: VariableRef[] = [];

    const lookup = (source: VariableSource, name: string): string | undefined => {
      if (source === 'env') return this.env[name] || undefined;
      const entry = this.options.credentials.resolve(name);
      if (!entry) return undefined;
      secrets.push(entry.value);
      return entry.value;
    };

    const expandOne = (text: string): string => {
      const result = expandVariables(text, lookup);
      unresolved.push(...result.unresolved);
      return result.text;
    };

    const stepEnv: NodeJS.ProcessEnv = {};
    for (const [key, value] of Object.entries(step.env)) {
      stepEnv[key] = expandOne(value);
    }

    return {
      argv: step.command.map(expandOne),
      probe: step.probe ? step.probe.map(expandOne) : null,
      cwd: step.cwd ? resolve(this.cwd, expandOne(step.cwd)) : this.cwd,
      env: { ...this.env, ...stepEnv },
      secrets,
      unresolved,
    };
  }

  private base(step: ProvisioningStep, command: string): StepResult {
    return {
      name: step.name,
      group: step.group,
      status: 'success',
      command,
      exit_code: null,
      output: '',
      duration_ms: 0,
      optional: step.optional,
      already_applied: false,
      reason: null,
      error_code: null,
    };
  }

  private skipped(step: ProvisioningStep, reason: string | null): StepResult {
    return { ...this.base(step, formatCommand(step.command)), status: 'skipped', reason };
  }

  private failed(step: ProvisioningStep, fields: Partial<StepResult> & { command: string }): StepResult {
    return { ...this.base(step, fields.command), ...fields, status: 'failed' };
  }
}

function describeFailure(
  outcome: CommandOutcome,
  timeoutSec: number | undefined,
): { reason: string; error_code: StepErrorCode } {
  if (outcome.timed_out) {
    return { reason: `timed out after ${timeoutSec ?? '?'}s`, error_code: ErrorCode.STEP_TIMEOUT };
  }
  if (outcome.exit_code === EXIT_COMMAND_NOT_FOUND && outcome.error) {
    return { reason: outcome.error, error_code: ErrorCode.COMMAND_NOT_FOUND };
  }
  if (outcome.error) {
    return { reason: outcome.error, error_code: ErrorCode.STEP_FAILED };
  }
  return { reason: `exit ${outcome.exit_code ?? '?'}`, error_code: ErrorCode.STEP_FAILED };
}
