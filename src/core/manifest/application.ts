/**
 * Application manifest shape helpers
 */

import { isRecord } from '../../shared/utils/types.js';
import { ApplicationManifestSchema } from '../models/schemas.js';
import type { ApplicationManifest, ApplicationSource } from '../models/types.js';

export function isApplicationManifest(document: unknown): document is ApplicationManifest {
  return ApplicationManifestSchema.safeParse(document).success;
}

/** `spec.source` when it is an object */
export function getSingleSource(manifest: ApplicationManifest): ApplicationSource | undefined {
  const spec = manifest.spec;
  if (!isRecord(spec)) return undefined;
  return isRecord(spec.source) ? spec.source : undefined;
}

/**
 * Object entries of `spec.sources`.
 * Returns undefined when `spec.sources` is absent, not a list, or empty,
 * so callers fall back to `spec.source`.
 */
export function getSourceList(manifest: ApplicationManifest): ApplicationSource[] | undefined {
  const spec = manifest.spec;
  if (!isRecord(spec) || !Array.isArray(spec.sources) || spec.sources.length === 0) {
    return undefined;
  }
  return spec.sources.filter(isRecord);
}

/** Whether `spec.source.chart` or any `spec.sources[].chart` equals the chart name */
export function referencesChart(manifest: ApplicationManifest, chartName: string): boolean {
  const source = getSingleSource(manifest);
  if (source?.chart === chartName) return true;
  const sources = getSourceList(manifest) ?? [];
  return sources.some((entry) => entry.chart === chartName);
}
