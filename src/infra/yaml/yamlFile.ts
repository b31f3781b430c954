/**
 * YAML document persistence
 *
 * Reads a YAML file into plain data and writes it back as a full-file
 * rewrite. Key insertion order is kept as parsed; keys are never sorted
 * and non-ASCII text is written as-is.
 */

import { existsSync, readFileSync, writeFileSync, renameSync, unlinkSync } from 'node:fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { createLogger, getErrorMessage, ManifestDataError } from '../../shared/utils/index.js';

const log = createLogger('yaml');

/**
 * Parse a YAML file.
 * Throws ManifestDataError naming the file when it cannot be read or parsed.
 */
export function readYamlFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ManifestDataError(`Failed to read ${filePath}: ${getErrorMessage(err)}`, filePath);
  }

  try {
    return parseYaml(content);
  } catch (err) {
    throw new ManifestDataError(`Invalid YAML in ${filePath}: ${getErrorMessage(err)}`, filePath);
  }
}

export function serializeYaml(document: unknown): string {
  return stringifyYaml(document, { lineWidth: 0 });
}

/**
 * Write file atomically using temp file + rename.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
  } catch (error) {
    try {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath);
      }
    } catch (cleanupError) {
      log.error('Failed to remove temp file', { tempPath, error: getErrorMessage(cleanupError) });
    }
    throw error;
  }
}

export function writeYamlFile(filePath: string, document: unknown): void {
  writeFileAtomic(filePath, serializeYaml(document));
  log.debug('Wrote YAML document', { filePath });
}
