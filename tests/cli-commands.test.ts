import { describe, it, expect, vi, beforeAll } from 'vitest';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { join, relative } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { testContext } from './helpers/test-context.js';
import { withErrorHandler, EXIT_CONFIGURATION_ERROR } from '../src/lib/command/with-error-handler.js';
import { DevstrapError, ErrorCode } from '../src/lib/errors.js';
import { parseTimeout } from '../src/commands/run/index.js';
import { planSteps, printPlan } from '../src/commands/list/index.js';
import { mergeSettingsCommand } from '../src/commands/merge-settings/index.js';

const ctx = testContext();
const fixture = join(import.meta.dirname, '..', 'fixtures', 'grouped.yaml');

beforeAll(() => {
  chalk.level = 0;
});

class ExitCalled extends Error {
  constructor(public readonly exitCode: number | string | null | undefined) {
    super(`process.exit(${exitCode})`);
  }
}

function stubExit() {
  vi.spyOn(console, 'error').mockImplementation(() => {});
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new ExitCalled(code);
  });
}

async function exitCodeOf(run: () => Promise<void>): Promise<number | string | null | undefined> {
  try {
    await run();
  } catch (err) {
    if (err instanceof ExitCalled) return err.exitCode;
    throw err;
  }
  return 'no exit';
}

// ── withErrorHandler ──

describe('withErrorHandler', () => {
  it('exits 3 for configuration errors', async () => {
    stubExit();
    const handler = withErrorHandler(async () => {
      throw new DevstrapError(ErrorCode.MANIFEST_VALIDATION_ERROR, 'bad manifest');
    });
    expect(await exitCodeOf(handler)).toBe(EXIT_CONFIGURATION_ERROR);
  });

  it('exits 1 for other devstrap errors and prints the hint', async () => {
    stubExit();
    const handler = withErrorHandler(async () => {
      throw new DevstrapError(ErrorCode.SETTINGS_NOT_FOUND, 'not a directory: /x', 'try again');
    });
    expect(await exitCodeOf(handler)).toBe(1);
    expect(console.error).toHaveBeenCalledWith('✗ not a directory: /x');
    expect(console.error).toHaveBeenCalledWith('  try again');
  });

  it('exits 1 for unexpected errors', async () => {
    stubExit();
    const handler = withErrorHandler(async () => {
      throw new Error('boom');
    });
    expect(await exitCodeOf(handler)).toBe(1);
    expect(console.error).toHaveBeenCalledWith('✗ boom');
  });

  it('does not exit when the handler succeeds', async () => {
    const exit = stubExit();
    const handler = withErrorHandler(async () => {});
    expect(await exitCodeOf(handler)).toBe('no exit');
    expect(exit).not.toHaveBeenCalled();
  });
});

// ── run options ──

describe('parseTimeout', () => {
  it('accepts whole and fractional seconds', () => {
    expect(parseTimeout('90')).toBe(90);
    expect(parseTimeout('1.5')).toBe(1.5);
  });

  it('rejects non-numbers and values below one second', () => {
    expect(() => parseTimeout('soon')).toThrow(InvalidArgumentError);
    expect(() => parseTimeout('0')).toThrow(InvalidArgumentError);
  });
});

// ── list / --dry-run ──

describe('planSteps', () => {
  it('evaluates conditions without running anything', () => {
    const plan = planSteps({ manifestFile: fixture, env: {} });
    expect(plan.steps.map((p) => [p.step.name, p.will_run, p.reason])).toEqual([
      ['install-pm', true, null],
      ['install-tool', true, null],
      ['register-docs', true, null],
      ['register-github', false, 'credential GITHUB_PAT not configured'],
    ]);
  });

  it('sees credentials from the environment', () => {
    const plan = planSteps({ manifestFile: fixture, only: ['mcp'], env: { GITHUB_PAT: 'test-secret' } });
    expect(plan.steps.map((p) => p.will_run)).toEqual([true, true]);
  });

  it('reads --env-file relative to the current directory', () => {
    const dir = ctx.createTempDir();
    const envFile = ctx.writeFile(dir, 'creds.env', 'GITHUB_PAT=test-secret\n');
    const plan = planSteps({
      manifestFile: fixture,
      only: ['mcp'],
      envFile: relative(process.cwd(), envFile),
      env: {},
    });
    expect(plan.steps.map((p) => p.will_run)).toEqual([true, true]);
  });
});

describe('printPlan', () => {
  it('groups steps and shows skip reasons', () => {
    const lines: string[] = [];
    printPlan(planSteps({ manifestFile: fixture, env: {} }), { write: (l) => lines.push(l) });

    expect(lines).toEqual([
      'Manifest: grouped-test',
      '  4 steps',
      '',
      '  tools',
      '    ○ install-pm       pm install self',
      '    ○ install-tool     pm add tool [optional]',
      '  mcp',
      '    ○ register-docs    agent mcp add docs [probed]',
      '    ⏭ register-github  agent mcp add github -H "Authorization: Bearer ${{ secrets.GITHUB_PAT }}"',
      '      skip: credential GITHUB_PAT not configured',
    ]);
  });

  it('prints JSON', () => {
    const lines: string[] = [];
    printPlan(planSteps({ manifestFile: fixture, only: ['tools'], env: {} }), {
      json: true,
      write: (l) => lines.push(l),
    });
    expect(JSON.parse(lines[0]!)).toEqual({
      manifest: 'grouped-test',
      steps: [
        { name: 'install-pm', group: 'tools', command: ['pm', 'install', 'self'], idempotent: true, optional: false, will_run: true, reason: null },
        { name: 'install-tool', group: 'tools', command: ['pm', 'add', 'tool'], idempotent: true, optional: true, will_run: true, reason: null },
      ],
    });
  });
});

// ── merge-settings ──

describe('merge-settings command', () => {
  it('merges every settings.local.json into the output file', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const root = ctx.createTempDir();
    ctx.writeFile(root, 'one/.claude/settings.local.json', JSON.stringify({ permissions: { allow: ['Read'] } }));
    ctx.writeFile(root, 'two/.claude/settings.local.json', JSON.stringify({ permissions: { allow: ['Edit', 'Read'] } }));
    const output = join(root, 'out', 'settings.json');

    await mergeSettingsCommand.parseAsync([root, '-o', output], { from: 'user' });

    expect(JSON.parse(readFileSync(output, 'utf-8'))).toEqual({
      permissions: { allow: ['Edit', 'Read'], deny: [], ask: [] },
    });
    expect(console.log).toHaveBeenCalledWith('📁 Found 2 settings file(s):');
    expect(console.log).toHaveBeenCalledWith('\n🆕 Added 2 new permissions');
  });
});
