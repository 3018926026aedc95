import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  parseManifestYaml,
  loadManifestFile,
  expandVariables,
  findVariables,
} from '../src/registry/parser.js';
import { listSteps, listGroups, parseGroupList } from '../src/registry/index.js';
import { normalizeCondition, normalizeCommand } from '../src/registry/types.js';
import { DevstrapError } from '../src/lib/errors.js';

const fixturesDir = join(import.meta.dirname, '..', 'fixtures');

function loadFixture(name: string): string {
  return readFileSync(join(fixturesDir, name), 'utf-8');
}

function validationMessage(content: string): string {
  try {
    parseManifestYaml(content);
  } catch (err) {
    if (err instanceof DevstrapError) return `${err.code}: ${err.message}`;
    throw err;
  }
  throw new Error('expected parseManifestYaml to throw');
}

// ── Schema validation ──

describe('parseManifestYaml', () => {
  it('parses minimal.yaml and applies defaults', () => {
    const manifest = parseManifestYaml(loadFixture('minimal.yaml'));
    expect(manifest.name).toBe('minimal-test');
    expect(manifest.env_file).toBe('.env');
    expect(manifest.fail_fast).toBe(false);
    expect(manifest.timeout_sec).toBeUndefined();

    const step = manifest.steps[0]!;
    expect(step.command).toEqual(['echo', 'hello']);
    expect(step.group).toBe('tools');
    expect(step.idempotent).toBe(true);
    expect(step.optional).toBe(false);
    expect(step.env).toEqual({});
    expect(step.condition).toBeUndefined();
    expect(step.probe).toBeUndefined();
  });

  it('parses grouped.yaml with conditions, probes and overrides', () => {
    const manifest = parseManifestYaml(loadFixture('grouped.yaml'));
    expect(manifest.env_file).toBe('credentials.env');
    expect(manifest.fail_fast).toBe(true);
    expect(manifest.timeout_sec).toBe(60);
    expect(manifest.steps.map((s) => s.name)).toEqual([
      'install-pm',
      'install-tool',
      'register-docs',
      'register-github',
    ]);
    expect(manifest.steps[1]!.command).toEqual(['pm', 'add', 'tool']);
    expect(manifest.steps[1]!.optional).toBe(true);
    expect(manifest.steps[1]!.timeout_sec).toBe(5);
    expect(manifest.steps[2]!.probe).toEqual(['agent', 'mcp', 'get', 'docs']);
    expect(manifest.steps[3]!.condition).toEqual({ type: 'credential', key: 'GITHUB_PAT' });
    expect(manifest.steps[3]!.env).toEqual({ AGENT_HOME: '${{ env.HOME }}/.agent' });
  });

  it('rejects duplicate step names', () => {
    expect(validationMessage(loadFixture('invalid-dup-name.yaml'))).toContain(
      'duplicate step name: "install-pm"',
    );
  });

  it('rejects a non-idempotent step without a probe', () => {
    expect(validationMessage(loadFixture('invalid-no-probe.yaml'))).toContain(
      'step "register-docs": idempotent: false requires a probe command',
    );
  });

  it('rejects a manifest without a name', () => {
    expect(validationMessage(loadFixture('invalid-no-name.yaml'))).toBe(
      'MANIFEST_VALIDATION_ERROR: ✗ name: Required',
    );
  });

  it('rejects an empty step list', () => {
    expect(validationMessage('name: empty\nsteps: []\n')).toContain(
      '✗ manifest steps must have at least one step',
    );
  });

  it('rejects a non kebab-case name', () => {
    expect(validationMessage('name: My Env\nsteps:\n  - name: a\n    command: a\n')).toContain(
      '✗ manifest name must be kebab-case',
    );
  });

  it('rejects unknown placeholders', () => {
    const yaml = 'name: vars\nsteps:\n  - name: a\n    command: ["echo", "${{ vars.X }}"]\n';
    expect(validationMessage(yaml)).toContain('step "a": unknown placeholder "${{ vars.X }}"');
  });

  it('rejects an unknown condition type', () => {
    const yaml = 'name: cond\nsteps:\n  - name: a\n    command: a\n    condition: { file: x }\n';
    expect(validationMessage(yaml)).toMatch(/^MANIFEST_VALIDATION_ERROR: ✗ steps\.0\.condition/);
  });

  it('rejects invalid YAML syntax', () => {
    expect(validationMessage('{ invalid yaml ][}')).toMatch(/^MANIFEST_PARSE_ERROR: Invalid YAML/);
  });

  it('rejects a YAML scalar', () => {
    expect(validationMessage('just a string')).toContain('must contain a YAML object');
  });
});

describe('loadManifestFile', () => {
  it('throws MANIFEST_NOT_FOUND for a missing file', () => {
    try {
      loadManifestFile(join(fixturesDir, 'nope.yaml'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DevstrapError);
      expect((err as DevstrapError).code).toBe('MANIFEST_NOT_FOUND');
      expect((err as DevstrapError).isConfigurationError).toBe(true);
    }
  });

  it('loads the shipped bootstrap.yaml in install order', () => {
    const manifest = loadManifestFile(join(import.meta.dirname, '..', 'bootstrap.yaml'));
    expect(listGroups(manifest)).toEqual(['tools', 'mcp', 'plugins']);
    expect(manifest.steps.map((s) => s.name)).toEqual([
      'install-pnpm',
      'install-uv',
      'install-bun',
      'install-claude-code',
      'install-ccstatusline',
      'install-ccusage',
      'install-codex',
      'mcp-context7',
      'mcp-playwright',
      'mcp-serena',
      'mcp-github',
      'install-ccplugins',
    ]);
    const github = manifest.steps.find((s) => s.name === 'mcp-github')!;
    expect(github.condition).toEqual({ type: 'credential', key: 'GITHUB_PAT' });
    expect(github.command.at(-1)).toBe('Authorization: Bearer ${{ secrets.GITHUB_PAT }}');
  });
});

// ── Step selection ──

describe('listSteps', () => {
  const manifest = parseManifestYaml(loadFixture('grouped.yaml'));

  it('returns every step in declared order by default', () => {
    expect(listSteps(manifest).map((s) => s.name)).toEqual([
      'install-pm',
      'install-tool',
      'register-docs',
      'register-github',
    ]);
  });

  it('filters by group', () => {
    expect(listSteps(manifest, { only: ['mcp'] }).map((s) => s.name)).toEqual([
      'register-docs',
      'register-github',
    ]);
  });

  it('throws UNKNOWN_GROUP for a group the manifest lacks', () => {
    try {
      listSteps(manifest, { only: ['mcp', 'fonts'] });
      expect.unreachable();
    } catch (err) {
      expect((err as DevstrapError).code).toBe('UNKNOWN_GROUP');
      expect((err as DevstrapError).message).toBe('unknown step group: fonts');
      expect((err as DevstrapError).hint).toBe('Available groups: tools, mcp');
    }
  });

  it('does not mutate the manifest', () => {
    const steps = listSteps(manifest);
    steps.pop();
    expect(manifest.steps).toHaveLength(4);
  });
});

describe('parseGroupList', () => {
  it('splits and trims comma-separated groups', () => {
    expect(parseGroupList('mcp, tools,')).toEqual(['mcp', 'tools']);
  });

  it('returns an empty list for no value', () => {
    expect(parseGroupList(undefined)).toEqual([]);
  });
});

// ── Short format normalization ──

describe('normalizeCondition', () => {
  it('expands short forms', () => {
    expect(normalizeCondition({ credential: 'GITHUB_PAT' })).toEqual({ type: 'credential', key: 'GITHUB_PAT' });
    expect(normalizeCondition({ env: 'HOME' })).toEqual({ type: 'env', name: 'HOME' });
    expect(normalizeCondition({ command_exists: 'pixi' })).toEqual({ type: 'command_exists', command: 'pixi' });
  });

  it('passes object form and unknown shapes through', () => {
    const full = { type: 'env', name: 'HOME' };
    expect(normalizeCondition(full)).toBe(full);
    expect(normalizeCondition(undefined)).toBeUndefined();
    expect(normalizeCondition('x')).toBe('x');
  });
});

describe('normalizeCommand', () => {
  it('splits a string on whitespace', () => {
    expect(normalizeCommand('  npm   install -g bun ')).toEqual(['npm', 'install', '-g', 'bun']);
  });

  it('leaves lists alone', () => {
    const argv = ['a', 'b c'];
    expect(normalizeCommand(argv)).toBe(argv);
  });
});

// ── Variable expansion ──

describe('expandVariables', () => {
  it('substitutes env and secrets', () => {
    const result = expandVariables('${{ env.ROOT }}/x ${{secrets.TOKEN}}', (source, name) =>
      source === 'env' ? `/${name.toLowerCase()}` : 'placeholder-token',
    );
    expect(result).toEqual({ text: '/root/x placeholder-token', unresolved: [] });
  });

  it('leaves unresolved placeholders intact and reports them', () => {
    const result = expandVariables('Bearer ${{ secrets.GITHUB_PAT }}', () => undefined);
    expect(result.text).toBe('Bearer ${{ secrets.GITHUB_PAT }}');
    expect(result.unresolved).toEqual([{ source: 'secrets', name: 'GITHUB_PAT' }]);
  });
});

describe('findVariables', () => {
  it('lists placeholders in order', () => {
    expect(findVariables('${{ env.A }} and ${{ secrets.B }}')).toEqual([
      { source: 'env', name: 'A' },
      { source: 'secrets', name: 'B' },
    ]);
  });
});
