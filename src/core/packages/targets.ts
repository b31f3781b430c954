/**
 * Package path template resolution
 *
 * A package path may contain `$`, which stands for an environment name.
 * Substitution is literal: every `$` is replaced, nothing else is expanded.
 */

import { ConfigurationError, ResolutionError } from '../../shared/utils/index.js';
import type { ManifestTarget } from '../models/types.js';

export const ENVIRONMENT_PLACEHOLDER = '$';

export interface EnvironmentContext {
  environment?: string;
  multiEnvironment: boolean;
  /** Comma-separated list, used in multi-environment mode */
  environments?: string;
}

export function hasPlaceholder(pathTemplate: string): boolean {
  return pathTemplate.includes(ENVIRONMENT_PLACEHOLDER);
}

export function substituteEnvironment(pathTemplate: string, environment: string): string {
  return pathTemplate.split(ENVIRONMENT_PLACEHOLDER).join(environment);
}

/** Split on commas, trim, drop empty and repeated names. */
export function parseEnvironmentList(raw: string | undefined): string[] {
  if (!raw) return [];
  const names = raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return [...new Set(names)];
}

/**
 * Resolve a package path template into the manifest paths to update.
 */
export function resolveTargets(pathTemplate: string, context: EnvironmentContext): ManifestTarget[] {
  if (context.multiEnvironment) {
    if (!hasPlaceholder(pathTemplate)) {
      throw new ResolutionError(
        `Multi-environment mode requires a "${ENVIRONMENT_PLACEHOLDER}" placeholder in the package path: ${pathTemplate}`,
      );
    }
    const environments = parseEnvironmentList(context.environments);
    if (environments.length === 0) {
      throw new ConfigurationError('Multi-environment mode requires a non-empty ENVIRONMENTS list.');
    }
    return environments.map((environment) => ({
      environment,
      path: substituteEnvironment(pathTemplate, environment),
    }));
  }

  if (!hasPlaceholder(pathTemplate)) {
    return [{ path: pathTemplate }];
  }

  if (!context.environment) {
    throw new ResolutionError(
      `Package path ${pathTemplate} contains "${ENVIRONMENT_PLACEHOLDER}" but no ENVIRONMENT (or MULTI_ENVIRONMENT) was given.`,
    );
  }

  return [{
    environment: context.environment,
    path: substituteEnvironment(pathTemplate, context.environment),
  }];
}
