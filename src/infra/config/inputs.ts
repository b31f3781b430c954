/**
 * Run input loading
 *
 * Each input is read, first non-empty wins, from:
 *   1. a CLI flag override
 *   2. `INPUT_<NAME>` (GitHub Actions input convention)
 *   3. `<NAME>` (plain environment variable)
 */

import { BumpInputsSchema } from '../../core/models/schemas.js';
import type { BumpInputs } from '../../core/models/types.js';
import { ConfigurationError } from '../../shared/utils/index.js';

type InputValueType = 'string' | 'boolean';

type InputKey = keyof BumpInputs;

interface InputSpec {
  key: InputKey;
  name: string;
  type: InputValueType;
  required?: boolean;
}

export const INPUT_SPECS: readonly InputSpec[] = [
  { key: 'repoUrl', name: 'REPO_URL', type: 'string', required: true },
  { key: 'token', name: 'TOKEN', type: 'string', required: true },
  { key: 'packageFilePath', name: 'PACKAGE_FILE_PATH', type: 'string', required: true },
  { key: 'packageName', name: 'PACKAGE_NAME', type: 'string', required: true },
  { key: 'version', name: 'VERSION', type: 'string', required: true },
  { key: 'chartName', name: 'CHART_NAME', type: 'string' },
  { key: 'branch', name: 'BRANCH', type: 'string' },
  { key: 'environment', name: 'ENVIRONMENT', type: 'string' },
  { key: 'multiEnvironment', name: 'MULTI_ENVIRONMENT', type: 'boolean' },
  { key: 'environments', name: 'ENVIRONMENTS', type: 'string' },
  { key: 'resolveMode', name: 'RESOLVE_MODE', type: 'string' },
  { key: 'verbose', name: 'VERBOSE', type: 'boolean' },
  { key: 'debugLogFile', name: 'DEBUG_LOG_FILE', type: 'string' },
];

export type InputOverrides = Partial<Record<InputKey, string | boolean | undefined>>;

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Environment variable names checked for an input, in priority order */
export function envVarNamesFor(name: string): [string, string] {
  return [`INPUT_${name}`, name];
}

function parseBoolean(name: string, raw: string): boolean {
  const normalized = raw.toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ConfigurationError(`${name} must be one of: true, false`);
}

function readRaw(spec: InputSpec, env: EnvSource, overrides: InputOverrides): string | boolean | undefined {
  const override = overrides[spec.key];
  if (typeof override === 'boolean') return override;
  if (typeof override === 'string' && override.trim().length > 0) return override.trim();

  for (const varName of envVarNamesFor(spec.name)) {
    const value = env[varName]?.trim();
    if (value) return value;
  }
  return undefined;
}

function specForKey(key: PropertyKey | undefined): InputSpec | undefined {
  return INPUT_SPECS.find((spec) => spec.key === key);
}

/**
 * Merge flag overrides and environment into validated inputs.
 * Throws ConfigurationError listing every missing required input.
 */
export function loadInputs(env: EnvSource = process.env, overrides: InputOverrides = {}): BumpInputs {
  const raw: Record<string, string | boolean> = {};

  for (const spec of INPUT_SPECS) {
    const value = readRaw(spec, env, overrides);
    if (value === undefined) continue;
    raw[spec.key] = spec.type === 'boolean' && typeof value === 'string'
      ? parseBoolean(spec.name, value)
      : value;
  }

  const missing = INPUT_SPECS
    .filter((spec) => spec.required && raw[spec.key] === undefined)
    .map((spec) => spec.name);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required inputs: ${missing.join(', ')}.`);
  }

  const result = BumpInputsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const spec = specForKey(issue?.path[0]);
    const label = spec ? spec.name : 'input';
    throw new ConfigurationError(`Invalid ${label}: ${issue?.message ?? 'validation failed'}`);
  }
  return result.data;
}
