import { accessSync, constants } from 'node:fs';
import { delimiter, isAbsolute, join } from 'node:path';
import type { CredentialResolver } from '../credentials/resolver.js';
import type { StepCondition } from '../registry/types.js';

export interface ConditionContext {
  env: NodeJS.ProcessEnv;
  credentials: CredentialResolver;
}

export interface ConditionOutcome {
  met: boolean;
  /** Human-readable reason when the condition is not met */
  reason: string | null;
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Look a program up on PATH the way a shell would (no PATHEXT handling) */
export function commandExists(command: string, env: NodeJS.ProcessEnv): boolean {
  if (isAbsolute(command) || command.includes('/')) return isExecutable(command);
  const dirs = (env.PATH ?? '').split(delimiter).filter(Boolean);
  return dirs.some((dir) => isExecutable(join(dir, command)));
}

export function evaluateCondition(
  condition: StepCondition | undefined,
  ctx: ConditionContext,
): ConditionOutcome {
  if (!condition) return { met: true, reason: null };

  switch (condition.type) {
    case 'credential':
      return ctx.credentials.has(condition.key)
        ? { met: true, reason: null }
        : { met: false, reason: `credential ${condition.key} not configured` };
    case 'env':
      return ctx.env[condition.name]
        ? { met: true, reason: null }
        : { met: false, reason: `environment variable ${condition.name} not set` };
    case 'command_exists':
      return commandExists(condition.command, ctx.env)
        ? { met: true, reason: null }
        : { met: false, reason: `command ${condition.command} not found on PATH` };
  }
}
