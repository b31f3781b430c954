/**
 * targetRevision updater
 *
 * Mutates exactly one source entry of a parsed Application manifest.
 * Every check runs before the write, so a failed call leaves the
 * manifest untouched.
 */

import { ManifestDataError, ResolutionError } from '../../shared/utils/index.js';
import type { ApplicationManifest, ApplicationSource } from '../models/types.js';
import { getSingleSource, getSourceList } from './application.js';

export interface RevisionUpdate {
  /** `chart` of the updated source, when it has one */
  chart?: string;
  previousRevision?: string;
  /** `source` or `sources[<index>]` */
  location: string;
}

function describeValue(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  return String(value);
}

function selectFromList(
  sources: ApplicationSource[],
  chartName: string | undefined,
  manifestPath: string,
): { entry: ApplicationSource; index: number } {
  if (chartName) {
    const index = sources.findIndex((entry) => entry.chart === chartName);
    const entry = sources[index];
    if (!entry) {
      throw new ResolutionError(`Chart "${chartName}" not found in spec.sources of ${manifestPath}.`);
    }
    return { entry, index };
  }

  const first = sources[0];
  if (!first) {
    throw new ManifestDataError(`spec.sources of ${manifestPath} has no source objects.`, manifestPath);
  }
  return { entry: first, index: 0 };
}

/**
 * Set `targetRevision` on the source selected by `chartName`.
 *
 * `spec.sources` (non-empty) wins over `spec.source`. Without a chart
 * name the first source of the list is used.
 *
 * @param manifestPath - only used in error messages
 */
export function updateTargetRevision(
  manifest: ApplicationManifest,
  version: string,
  chartName?: string,
  manifestPath = '<manifest>',
): RevisionUpdate {
  const sources = getSourceList(manifest);

  let entry: ApplicationSource;
  let location: string;

  if (sources) {
    const selected = selectFromList(sources, chartName, manifestPath);
    entry = selected.entry;
    location = `sources[${selected.index}]`;
  } else {
    const source = getSingleSource(manifest);
    if (!source) {
      throw new ManifestDataError(
        `Application manifest ${manifestPath} has no spec.source (or spec.sources).`,
        manifestPath,
      );
    }
    if (chartName && source.chart !== chartName) {
      throw new ResolutionError(
        `Chart in spec.source of ${manifestPath} is "${describeValue(source.chart) ?? ''}", not "${chartName}".`,
      );
    }
    entry = source;
    location = 'source';
  }

  const update: RevisionUpdate = {
    chart: describeValue(entry.chart),
    previousRevision: describeValue(entry.targetRevision),
    location,
  };
  entry.targetRevision = version;
  return update;
}
