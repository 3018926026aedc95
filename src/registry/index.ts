import { DevstrapError, ErrorCode } from '../lib/errors.js';
import type { Manifest, ProvisioningStep } from './types.js';

export {
  parseManifestYaml,
  loadManifestFile,
  formatManifestError,
  expandVariables,
  findVariables,
  type VariableRef,
  type VariableSource,
  type VariableLookup,
  type ExpandResult,
} from './parser.js';
export {
  manifestSchema,
  stepSchema,
  conditionSchema,
  normalizeCondition,
  normalizeCommand,
  MANIFEST_DEFAULTS,
  type Manifest,
  type ProvisioningStep,
  type StepCondition,
} from './types.js';

export interface ListStepsOptions {
  /** Restrict to these groups; empty or undefined means every group */
  only?: readonly string[];
}

/** Ordered group names as they first appear in the manifest */
export function listGroups(manifest: Manifest): string[] {
  return [...new Set(manifest.steps.map((s) => s.group))];
}

/**
 * Steps in declared order, optionally restricted to a set of groups.
 * Throws DevstrapError(UNKNOWN_GROUP) for a group the manifest does not define.
 */
export function listSteps(manifest: Manifest, options: ListStepsOptions = {}): ProvisioningStep[] {
  const only = options.only ?? [];
  if (only.length === 0) return [...manifest.steps];

  const groups = listGroups(manifest);
  const unknown = only.filter((g) => !groups.includes(g));
  if (unknown.length > 0) {
    throw new DevstrapError(
      ErrorCode.UNKNOWN_GROUP,
      `unknown step group: ${unknown.join(', ')}`,
      `Available groups: ${groups.join(', ')}`,
    );
  }

  return manifest.steps.filter((s) => only.includes(s.group));
}

/** Parse a comma-separated `--only` value into group names */
export function parseGroupList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((g) => g.trim()).filter(Boolean);
}
