/**
 * Tests for YAML document persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readYamlFile, serializeYaml, writeYamlFile } from '../infra/yaml/yamlFile.js';
import { ManifestDataError } from '../shared/utils/error.js';

describe('serializeYaml', () => {
  it('should keep insertion order instead of sorting keys', () => {
    const text = serializeYaml({
      kind: 'Application',
      apiVersion: 'argoproj.io/v1alpha1',
      spec: { source: { targetRevision: '2.0.0', chart: 'c' } },
    });

    expect(text).toBe(
      'kind: Application\n'
      + 'apiVersion: argoproj.io/v1alpha1\n'
      + 'spec:\n'
      + '  source:\n'
      + '    targetRevision: 2.0.0\n'
      + '    chart: c\n',
    );
  });

  it('should write non-ASCII text unescaped', () => {
    expect(serializeYaml({ description: 'Déploiement café' })).toBe('description: Déploiement café\n');
  });

  it('should not fold long strings', () => {
    const long = Array.from({ length: 40 }, (_, i) => `word${i}`).join(' ');

    expect(serializeYaml({ note: long })).toBe(`note: ${long}\n`);
  });
});

describe('readYamlFile / writeYamlFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'argo-chart-bump-yaml-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read a document written by writeYamlFile', () => {
    const filePath = join(dir, 'app.yaml');
    const document = { kind: 'Application', spec: { sources: [{ chart: 'c1', targetRevision: '1.2.3' }] } };

    writeYamlFile(filePath, document);

    expect(readYamlFile(filePath)).toEqual(document);
    expect(readdirSync(dir)).toEqual(['app.yaml']);
  });

  it('should replace the whole file', () => {
    const filePath = join(dir, 'app.yaml');
    writeFileSync(filePath, '# comment\nkind: Application\nextra: value\n');

    writeYamlFile(filePath, { kind: 'Application' });

    expect(readFileSync(filePath, 'utf-8')).toBe('kind: Application\n');
  });

  it('should name the file when the YAML is invalid', () => {
    const filePath = join(dir, 'broken.yaml');
    writeFileSync(filePath, 'spec: [unclosed\n');

    expect(() => readYamlFile(filePath)).toThrow(ManifestDataError);
    expect(() => readYamlFile(filePath)).toThrow(`Invalid YAML in ${filePath}`);
  });

  it('should name the file when it cannot be read', () => {
    const filePath = join(dir, 'missing.yaml');

    expect(() => readYamlFile(filePath)).toThrow(`Failed to read ${filePath}`);
  });
});
