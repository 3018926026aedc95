import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach } from 'vitest';
import type { CommandOutcome, CommandRequest, CommandRunner } from '../../src/runner/types.js';
import type { ProvisioningStep } from '../../src/registry/types.js';

/**
 * Create a test context with auto-cleanup.
 * Temp dirs are removed in afterEach.
 */
export function testContext() {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs) {
      try {
        rmSync(dir, { recursive: true, force: true });
      } catch {
        // EBUSY on Windows: a child process may still hold locks
      }
    }
    tempDirs.length = 0;
  });

  return {
    createTempDir(): string {
      const dir = mkdtempSync(join(tmpdir(), 'devstrap-test-'));
      tempDirs.push(dir);
      return dir;
    },
    writeFile(dir: string, rel: string, content: string): string {
      const path = join(dir, rel);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content);
      return path;
    },
  };
}

export function makeStep(overrides: Partial<ProvisioningStep> & { name: string }): ProvisioningStep {
  return {
    group: 'tools',
    command: ['tool', overrides.name],
    idempotent: true,
    optional: false,
    env: {},
    ...overrides,
  };
}

/**
 * In-process stand-in for spawnCommand. Exit codes are looked up by program
 * name (then by full command line); unknown commands exit 0.
 */
export function fakeRunner(exitCodes: Record<string, number> = {}) {
  const calls: CommandRequest[] = [];
  const runner: CommandRunner = async (request): Promise<CommandOutcome> => {
    calls.push(request);
    const line = [request.program, ...request.args].join(' ');
    const exit_code = exitCodes[line] ?? exitCodes[request.program] ?? 0;
    return { exit_code, output: `ran ${line}\n`, timed_out: false, error: null };
  };
  return { runner, calls };
}
