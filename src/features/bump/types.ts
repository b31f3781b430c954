/**
 * Bump run types
 */

import type { LocatedApplication, ManifestTarget } from '../../core/models/index.js';
import type { RevisionUpdate } from '../../core/manifest/index.js';

export interface BumpExecutionOptions {
  /** Parent directory for the run's temp clone (defaults to the OS temp dir) */
  tempRoot?: string;
}

/** A manifest located and updated in memory, not yet written */
export interface PreparedUpdate {
  target: ManifestTarget;
  located: LocatedApplication;
  /** Manifest path relative to the clone root, as staged */
  relativePath: string;
  update: RevisionUpdate;
}

interface BumpResultBase {
  /** Clone directory; left in place after the run */
  workdir: string;
}

export interface PackageNotFoundResult extends BumpResultBase {
  status: 'package-not-found';
}

export interface NoChangesResult extends BumpResultBase {
  status: 'no-changes';
  files: string[];
  commitMessage: string;
}

export interface PushedResult extends BumpResultBase {
  status: 'pushed';
  files: string[];
  commitMessage: string;
  commitHash: string;
}

export type BumpResult = PackageNotFoundResult | NoChangesResult | PushedResult;
