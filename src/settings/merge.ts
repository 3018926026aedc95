import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, relative, sep } from 'node:path';
import { z } from 'zod';
import { DevstrapError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';

export const SETTINGS_LOCAL_SUFFIX = join('.claude', 'settings.local.json');
export const DEFAULT_SETTINGS_OUTPUT = join('conf', '.claude', 'settings.json');

const permissionsSchema = z.object({
  permissions: z
    .object({
      allow: z.array(z.string()).default([]),
    })
    .passthrough()
    .default({}),
}).passthrough();

const settingsObjectSchema = z.record(z.unknown());

export type Logger = (line: string) => void;

export interface MergeLogger {
  info: Logger;
  warn: Logger;
}

const consoleLogger: MergeLogger = {
  info: (line) => console.log(line),
  warn: (line) => console.error(line),
};

/** Every `.claude/settings.local.json` below root, sorted */
export function findSettingsFiles(root: string): string[] {
  const entries = readdirSync(root, { recursive: true, encoding: 'utf-8' });
  return entries
    .filter((rel) => rel === SETTINGS_LOCAL_SUFFIX || rel.endsWith(sep + SETTINGS_LOCAL_SUFFIX))
    .map((rel) => join(root, rel))
    .sort();
}

/** The `permissions.allow` list of one file; unreadable files contribute nothing */
export function extractAllowPermissions(file: string, log: MergeLogger = consoleLogger): Set<string> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    log.warn(`⚠ Error reading ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return new Set();
  }

  const result = permissionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    log.warn(`⚠ Unexpected settings shape in ${file}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trimEnd());
    return new Set();
  }
  return new Set(result.data.permissions.allow);
}

export function mergePermissions(
  files: readonly string[],
  root: string,
  log: MergeLogger = consoleLogger,
): Set<string> {
  const all = new Set<string>();
  for (const file of files) {
    const permissions = extractAllowPermissions(file, log);
    if (permissions.size === 0) continue;

    const rel = relative(root, file);
    const display = rel.startsWith('..') ? file : rel;
    log.info(`  📄 Found ${permissions.size} permissions in: ${display}`);
    for (const p of permissions) all.add(p);
  }
  return all;
}

/** Parse JSON, retrying once with trailing commas removed */
export function parseLenientJson(content: string): { value: unknown; fixed: boolean } {
  try {
    return { value: JSON.parse(content), fixed: false };
  } catch {
    return { value: JSON.parse(content.replace(/,\s*([}\]])/g, '$1')), fixed: true };
  }
}

export interface UpdateResult {
  added: string[];
  total: number;
  output: string;
}

/**
 * Merge permissions into the settings file at output, keeping every other key.
 * `allow` becomes the sorted union; `deny` and `ask` are created when missing.
 */
export function updateSettingsFile(
  output: string,
  permissions: ReadonlySet<string>,
  log: MergeLogger = consoleLogger,
): UpdateResult {
  let settings: Record<string, unknown> = {};
  let existingAllow = new Set<string>();

  if (existsSync(output)) {
    let parsed: { value: unknown; fixed: boolean };
    try {
      parsed = parseLenientJson(readFileSync(output, 'utf-8'));
    } catch (err) {
      throw new DevstrapError(
        ErrorCode.SETTINGS_PARSE_ERROR,
        `could not parse existing settings: ${output}`,
        err instanceof Error ? err.message : undefined,
      );
    }
    if (parsed.fixed) {
      log.warn(`⚠ Fixed JSON formatting issues (trailing commas) in: ${output}`);
    }

    const asObject = settingsObjectSchema.safeParse(parsed.value);
    const withAllow = permissionsSchema.safeParse(parsed.value);
    if (!asObject.success || !withAllow.success) {
      throw new DevstrapError(
        ErrorCode.SETTINGS_PARSE_ERROR,
        `existing settings are not a settings object: ${output}`,
        'Expected { "permissions": { "allow": [ ... ] } }',
      );
    }
    settings = asObject.data;
    existingAllow = new Set(withAllow.data.permissions.allow);
    log.info(`📖 Reading existing settings from: ${output}`);
    log.info(`  📋 Found ${existingAllow.size} existing allowed permissions`);
  }

  const merged = new Set([...existingAllow, ...permissions]);
  const currentPermissions = settingsObjectSchema.safeParse(settings.permissions);
  const nextPermissions: Record<string, unknown> = currentPermissions.success ? { ...currentPermissions.data } : {};
  nextPermissions.allow = [...merged].sort();
  nextPermissions.deny ??= [];
  nextPermissions.ask ??= [];
  settings.permissions = nextPermissions;

  mkdirSync(dirname(output), { recursive: true });
  writeFileSync(output, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  debug('settings', `wrote ${merged.size} permissions to ${output}`);

  const added = [...permissions].filter((p) => !existingAllow.has(p)).sort();
  return { added, total: merged.size, output };
}
