/**
 * Tests for the targetRevision updater
 */

import { describe, it, expect } from 'vitest';
import { updateTargetRevision } from '../core/manifest/updater.js';
import type { ApplicationManifest } from '../core/models/index.js';
import { ManifestDataError, ResolutionError } from '../shared/utils/error.js';

function singleSourceApp(): ApplicationManifest {
  return {
    apiVersion: 'argoproj.io/v1alpha1',
    kind: 'Application',
    metadata: { name: 'web' },
    spec: {
      project: 'default',
      source: {
        repoURL: 'https://charts.example.com',
        chart: 'mychart',
        targetRevision: '1.0.0',
        helm: { releaseName: 'web' },
      },
    },
  };
}

function multiSourceApp(): ApplicationManifest {
  return {
    kind: 'Application',
    spec: {
      sources: [
        { chart: 'c1', targetRevision: '1' },
        { chart: 'c2', targetRevision: '2' },
      ],
    },
  };
}

describe('updateTargetRevision', () => {
  it('should update spec.source.targetRevision and nothing else', () => {
    // Given
    const manifest = singleSourceApp();
    const expected = singleSourceApp();
    expected.spec = {
      project: 'default',
      source: {
        repoURL: 'https://charts.example.com',
        chart: 'mychart',
        targetRevision: '2.0.0',
        helm: { releaseName: 'web' },
      },
    };

    // When
    const update = updateTargetRevision(manifest, '2.0.0');

    // Then
    expect(manifest).toEqual(expected);
    expect(update).toEqual({ chart: 'mychart', previousRevision: '1.0.0', location: 'source' });
  });

  it('should accept a chart name matching spec.source.chart', () => {
    const manifest = singleSourceApp();

    updateTargetRevision(manifest, '3.1.0', 'mychart');

    expect(manifest.spec).toMatchObject({ source: { targetRevision: '3.1.0' } });
  });

  it('should update the first spec.sources entry when no chart name is given', () => {
    const manifest = multiSourceApp();

    const update = updateTargetRevision(manifest, '9');

    expect(manifest.spec).toEqual({
      sources: [
        { chart: 'c1', targetRevision: '9' },
        { chart: 'c2', targetRevision: '2' },
      ],
    });
    expect(update.location).toBe('sources[0]');
  });

  it('should update only the spec.sources entry matching the chart name', () => {
    const manifest = multiSourceApp();

    const update = updateTargetRevision(manifest, '9', 'c2');

    expect(manifest.spec).toEqual({
      sources: [
        { chart: 'c1', targetRevision: '1' },
        { chart: 'c2', targetRevision: '9' },
      ],
    });
    expect(update).toEqual({ chart: 'c2', previousRevision: '2', location: 'sources[1]' });
  });

  it('should prefer spec.sources over spec.source', () => {
    const manifest: ApplicationManifest = {
      kind: 'Application',
      spec: {
        source: { chart: 'legacy', targetRevision: '0.1.0' },
        sources: [{ chart: 'current', targetRevision: '1.0.0' }],
      },
    };

    updateTargetRevision(manifest, '1.1.0');

    expect(manifest.spec).toEqual({
      source: { chart: 'legacy', targetRevision: '0.1.0' },
      sources: [{ chart: 'current', targetRevision: '1.1.0' }],
    });
  });

  it('should fall back to spec.source when spec.sources is empty', () => {
    const manifest: ApplicationManifest = {
      kind: 'Application',
      spec: {
        source: { chart: 'only', targetRevision: '1' },
        sources: [],
      },
    };

    updateTargetRevision(manifest, '2');

    expect(manifest.spec).toEqual({
      source: { chart: 'only', targetRevision: '2' },
      sources: [],
    });
  });

  it('should fail without mutating when the chart name matches no spec.sources entry', () => {
    const manifest = multiSourceApp();

    expect(() => updateTargetRevision(manifest, '9', 'missing')).toThrow(ResolutionError);
    expect(manifest).toEqual(multiSourceApp());
  });

  it('should fail without mutating when the chart name differs from spec.source.chart', () => {
    const manifest: ApplicationManifest = {
      kind: 'Application',
      spec: { source: { chart: 'other', targetRevision: '1' } },
    };

    expect(() => updateTargetRevision(manifest, '2', 'wanted', 'apps/web.yaml'))
      .toThrow('Chart in spec.source of apps/web.yaml is "other", not "wanted".');
    expect(manifest.spec).toEqual({ source: { chart: 'other', targetRevision: '1' } });
  });

  it('should fail when the manifest has neither spec.source nor spec.sources', () => {
    const manifest: ApplicationManifest = { kind: 'Application', spec: {} };

    expect(() => updateTargetRevision(manifest, '1')).toThrow(ManifestDataError);
  });

  it('should fail when the manifest has no spec at all', () => {
    const manifest: ApplicationManifest = { kind: 'Application' };

    expect(() => updateTargetRevision(manifest, '1', undefined, 'app.yaml'))
      .toThrow('Application manifest app.yaml has no spec.source (or spec.sources).');
  });

  it('should set a targetRevision on a source that had none', () => {
    const manifest: ApplicationManifest = {
      kind: 'Application',
      spec: { source: { chart: 'fresh' } },
    };

    const update = updateTargetRevision(manifest, '0.1.0');

    expect(manifest.spec).toEqual({ source: { chart: 'fresh', targetRevision: '0.1.0' } });
    expect(update.previousRevision).toBeUndefined();
  });
});
