import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { DevstrapError, ErrorCode } from '../lib/errors.js';
import { manifestSchema, type Manifest, type ProvisioningStep } from './types.js';

// ── Variable expansion ──

const VARIABLE_PATTERN = /\$\{\{\s*(env|secrets)\.\s*([a-zA-Z_]\w*)\s*\}\}/g;
const ANY_PLACEHOLDER = /\$\{\{([^}]*)\}\}/g;

export type VariableSource = 'env' | 'secrets';

export interface VariableRef {
  source: VariableSource;
  name: string;
}

/** Lookup used during expansion; returns undefined for an unresolved name */
export type VariableLookup = (source: VariableSource, name: string) => string | undefined;

export interface ExpandResult {
  text: string;
  unresolved: VariableRef[];
}

/** Replace `${{ env.X }}` and `${{ secrets.X }}` placeholders; unresolved ones stay intact */
export function expandVariables(text: string, lookup: VariableLookup): ExpandResult {
  const unresolved: VariableRef[] = [];
  const expanded = text.replace(VARIABLE_PATTERN, (match, source: VariableSource, name: string) => {
    const value = lookup(source, name);
    if (value === undefined) {
      unresolved.push({ source, name });
      return match;
    }
    return value;
  });
  return { text: expanded, unresolved };
}

/** List every well-formed placeholder in a string */
export function findVariables(text: string): VariableRef[] {
  return [...text.matchAll(VARIABLE_PATTERN)].map((m): VariableRef => ({
    source: m[1] === 'secrets' ? 'secrets' : 'env',
    name: m[2]!,
  }));
}

function stepStrings(step: ProvisioningStep): string[] {
  return [
    ...step.command,
    ...(step.probe ?? []),
    ...(step.cwd ? [step.cwd] : []),
    ...Object.values(step.env),
  ];
}

// ── Pre-validation (catch structural errors before Zod) ──

function preValidate(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return '✗ bootstrap.yaml must contain a YAML object\n  Example:\n    name: my-env\n    steps:\n      - name: install-pnpm\n        command: [pixi, global, install, pnpm]';
  }

  if ('name' in raw && typeof raw.name === 'number') {
    return '✗ manifest name must be a string, not a number\n  Example: name: "dev-environment"';
  }

  if ('steps' in raw && Array.isArray(raw.steps) && raw.steps.some((s: unknown) => Array.isArray(s))) {
    return '✗ steps must be an array of objects, not nested arrays\n  Each step needs: name, command';
  }

  return null;
}

// ── Error formatting ──

export function formatManifestError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    if (path === 'steps' && issue.code === 'too_small') {
      lines.push('✗ manifest steps must have at least one step');
      lines.push('  Example:\n    steps:\n      - name: install-uv\n        command: [pixi, global, install, uv]');
      continue;
    }

    if (path === 'name' && issue.code === 'invalid_string') {
      lines.push('✗ manifest name must be kebab-case');
      lines.push('  Example: dev-environment, ci-runner');
      continue;
    }

    if (issue.code === 'custom') {
      lines.push(`✗ ${issue.message}`);
      continue;
    }

    lines.push(`✗ ${path}: ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Business rule validation (superRefine) ──

const manifestWithRules = manifestSchema.superRefine((manifest, ctx) => {
  // 1. Unique step names
  const seen = new Set<string>();
  for (const step of manifest.steps) {
    if (seen.has(step.name)) {
      ctx.addIssue({ code: 'custom', message: `duplicate step name: "${step.name}"` });
    }
    seen.add(step.name);
  }

  for (const step of manifest.steps) {
    // 2. Non-idempotent steps need a probe to guard reapplication
    if (!step.idempotent && !step.probe) {
      ctx.addIssue({
        code: 'custom',
        message: `step "${step.name}": idempotent: false requires a probe command`,
      });
    }

    // 3. Placeholders must be env.X or secrets.X
    for (const value of stepStrings(step)) {
      for (const m of value.matchAll(ANY_PLACEHOLDER)) {
        if (findVariables(m[0]).length === 0) {
          ctx.addIssue({
            code: 'custom',
            message: `step "${step.name}": unknown placeholder "${m[0]}" (use \${{ env.NAME }} or \${{ secrets.NAME }})`,
          });
        }
      }
    }
  }
});

// ── Public API ──

/** Parse a YAML string into a validated Manifest. Throws DevstrapError on failure. */
export function parseManifestYaml(content: string): Manifest {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new DevstrapError(
      ErrorCode.MANIFEST_PARSE_ERROR,
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'Check your bootstrap.yaml for syntax errors (indentation, colons, etc.)',
    );
  }

  const preError = preValidate(raw);
  if (preError) {
    throw new DevstrapError(ErrorCode.MANIFEST_VALIDATION_ERROR, preError);
  }

  const result = manifestWithRules.safeParse(raw);
  if (!result.success) {
    throw new DevstrapError(
      ErrorCode.MANIFEST_VALIDATION_ERROR,
      formatManifestError(result.error),
      'Fix the issues above and try again',
    );
  }

  return result.data;
}

/** Load and parse a manifest file. Throws DevstrapError on failure. */
export function loadManifestFile(filePath: string): Manifest {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new DevstrapError(
      ErrorCode.MANIFEST_NOT_FOUND,
      `manifest not found: ${filePath}`,
      'Run: devstrap run --file <path-to-bootstrap.yaml>',
    );
  }

  return parseManifestYaml(content);
}
