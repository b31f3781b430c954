/**
 * Package index loading and lookup
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { readYamlFile } from '../../infra/yaml/yamlFile.js';
import { ManifestDataError, ResolutionError } from '../../shared/utils/index.js';
import { PackageIndexSchema } from '../models/schemas.js';
import type { PackageEntry, PackageIndex } from '../models/types.js';

/**
 * Validate a parsed package index document.
 *
 * @param filePath - used in error messages
 */
export function parsePackageIndex(document: unknown, filePath: string): PackageIndex {
  const result = PackageIndexSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (at ${issue.path.join('.')})` : '';
    throw new ManifestDataError(
      `Package file ${filePath} must contain a top-level "packages" list of { name, path } entries${where}.`,
      filePath,
    );
  }
  return result.data;
}

/** Read and validate the package index at `packageFilePath` (relative to the clone root). */
export function loadPackageIndex(workdir: string, packageFilePath: string): PackageIndex {
  const fullPath = resolve(workdir, packageFilePath);
  if (!existsSync(fullPath)) {
    throw new ResolutionError(`Package file not found: ${fullPath}`);
  }
  return parsePackageIndex(readYamlFile(fullPath), fullPath);
}

/** Exact-name lookup; the first matching entry wins. */
export function findPackage(index: PackageIndex, name: string): PackageEntry | undefined {
  return index.packages.find((entry) => entry.name === name);
}
