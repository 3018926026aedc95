import { z } from 'zod';

// ── Defaults (centralized) ──

export const MANIFEST_DEFAULTS = {
  file: 'bootstrap.yaml',
  env_file: '.env',
  group: 'tools',
} as const;

// ── Reusable primitives ──

const kebabCase = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be kebab-case');

const envName = z
  .string()
  .min(1)
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name');

// ── Condition schemas ──

const credentialCondition = z.object({
  type: z.literal('credential'),
  key: envName,
});

const envCondition = z.object({
  type: z.literal('env'),
  name: envName,
});

const commandExistsCondition = z.object({
  type: z.literal('command_exists'),
  command: z.string().min(1),
});

export const conditionSchema = z.discriminatedUnion('type', [
  credentialCondition,
  envCondition,
  commandExistsCondition,
]);

// ── Short format normalization ──

/**
 * Normalize a short-format condition into object format.
 *
 * Short format examples:
 *   - `credential: GITHUB_PAT`
 *   - `env: PIXI_PROJECT_ROOT`
 *   - `command_exists: pixi`
 */
export function normalizeCondition(raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return raw;
  }

  // Already has `type` field → object format, pass through
  if ('type' in raw) return raw;

  const entries = Object.entries(raw);
  if (entries.length !== 1) return raw;

  const [type, value] = entries[0]!;
  switch (type) {
    case 'credential':
      return { type: 'credential', key: String(value) };
    case 'env':
      return { type: 'env', name: String(value) };
    case 'command_exists':
      return { type: 'command_exists', command: String(value) };
    default:
      return raw;
  }
}

/**
 * Normalize a command written as a single string into an argument list.
 * Arguments containing spaces need the list form.
 */
export function normalizeCommand(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  return raw.trim().split(/\s+/).filter(Boolean);
}

const commandSchema = z.preprocess(normalizeCommand, z.array(z.string().min(1)).min(1));

// ── Step schema ──

export const stepSchema = z.object({
  name: kebabCase,
  group: kebabCase.default(MANIFEST_DEFAULTS.group),
  description: z.string().optional(),
  command: commandSchema,
  condition: z.preprocess(normalizeCondition, conditionSchema.optional()),
  probe: commandSchema.optional(),
  idempotent: z.boolean().default(true),
  optional: z.boolean().default(false),
  cwd: z.string().optional(),
  env: z.record(z.string()).default({}),
  timeout_sec: z.number().min(1).optional(),
});

// ── Manifest schema ──

export const manifestSchema = z.object({
  name: kebabCase,
  description: z.string().optional(),
  env_file: z.string().min(1).default(MANIFEST_DEFAULTS.env_file),
  fail_fast: z.boolean().default(false),
  timeout_sec: z.number().min(1).optional(),
  steps: z.array(stepSchema).min(1),
});

// ── Derived TypeScript types ──

export type StepCondition = z.infer<typeof conditionSchema>;
export type ProvisioningStep = z.infer<typeof stepSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
