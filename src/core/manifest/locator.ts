/**
 * Application manifest locator
 *
 * Turns a package path (relative to the clone root) into a parsed
 * Application manifest. In `file` mode the path must name the manifest;
 * in `scan` mode a directory is searched for one.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { readYamlFile } from '../../infra/yaml/yamlFile.js';
import { createLogger, getErrorMessage, ManifestDataError, ResolutionError } from '../../shared/utils/index.js';
import type { LocatedApplication, ResolveMode } from '../models/types.js';
import { isApplicationManifest, referencesChart } from './application.js';

const log = createLogger('locator');

const MANIFEST_EXTENSIONS = ['.yaml', '.yml'];

export interface LocateOptions {
  chartName?: string;
  mode: ResolveMode;
}

function hasManifestExtension(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return MANIFEST_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

function chartSuffix(chartName: string | undefined): string {
  return chartName ? ` with chart "${chartName}"` : '';
}

/**
 * Load a single file and require it to be an Application manifest.
 */
export function loadApplicationFile(filePath: string): LocatedApplication {
  const document = readYamlFile(filePath);
  if (!isApplicationManifest(document)) {
    throw new ManifestDataError(`File ${filePath} is not an Argo CD Application manifest.`, filePath);
  }
  return { path: filePath, document };
}

/**
 * Scan the immediate YAML files of a directory for an Application manifest.
 *
 * Files are visited in lexical order. With a chart name, only manifests
 * referencing that chart qualify. The first qualifying manifest wins.
 * Files that cannot be read or parsed are skipped, as are broken symlinks.
 */
export function findApplicationInDir(dirPath: string, chartName?: string): LocatedApplication | undefined {
  const fileNames = readdirSync(dirPath).sort();

  for (const fileName of fileNames) {
    if (!hasManifestExtension(fileName)) continue;

    const filePath = join(dirPath, fileName);
    // Dangling symlinks have no target to stat
    if (!statSync(filePath, { throwIfNoEntry: false })?.isFile()) continue;

    let document: unknown;
    try {
      document = readYamlFile(filePath);
    } catch (err) {
      log.debug('Skipping unparsable file', { filePath, error: getErrorMessage(err) });
      continue;
    }

    if (!isApplicationManifest(document)) continue;
    if (chartName && !referencesChart(document, chartName)) continue;

    log.debug('Application manifest found', { filePath, chartName });
    return { path: filePath, document };
  }

  return undefined;
}

/**
 * Resolve a package path to its Application manifest.
 * Throws ResolutionError or ManifestDataError; never returns without a manifest.
 */
export function resolveApplicationPath(
  workdir: string,
  packagePath: string,
  options: LocateOptions,
): LocatedApplication {
  const root = resolve(workdir);
  const resolved = resolve(root, packagePath);
  const fromRoot = relative(root, resolved);

  if (fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
    throw new ResolutionError(`Path ${packagePath} points outside the repository.`);
  }
  if (!existsSync(resolved)) {
    throw new ResolutionError(`Path does not exist: ${resolved}`);
  }

  const stats = statSync(resolved);
  if (stats.isFile()) {
    return loadApplicationFile(resolved);
  }

  if (!stats.isDirectory()) {
    throw new ResolutionError(`Path ${resolved} is neither a file nor a directory.`);
  }

  if (options.mode !== 'scan') {
    throw new ResolutionError(
      `Path ${resolved} is a directory; point the package path at the Application file or use resolve mode "scan".`,
    );
  }

  const found = findApplicationInDir(resolved, options.chartName);
  if (!found) {
    throw new ResolutionError(`No Argo CD Application found in directory ${resolved}${chartSuffix(options.chartName)}.`);
  }
  return found;
}
