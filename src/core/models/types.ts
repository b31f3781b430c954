/**
 * Core type definitions
 */

import type { z } from 'zod/v4';
import type {
  BumpInputsSchema,
  PackageEntrySchema,
  PackageIndexSchema,
  ResolveModeSchema,
} from './schemas.js';

export type PackageEntry = z.infer<typeof PackageEntrySchema>;
export type PackageIndex = z.infer<typeof PackageIndexSchema>;
export type BumpInputs = z.infer<typeof BumpInputsSchema>;

/**
 * How a package path is turned into a manifest.
 * - file: the path must point at the manifest file
 * - scan: a directory path is scanned for a matching manifest
 */
export type ResolveMode = z.infer<typeof ResolveModeSchema>;

/** One source entry of an Application (`spec.source` or an item of `spec.sources`) */
export interface ApplicationSource {
  chart?: unknown;
  targetRevision?: unknown;
  [key: string]: unknown;
}

/** Parsed Application manifest. Everything except `kind` is unchecked. */
export interface ApplicationManifest {
  kind: 'Application';
  spec?: unknown;
  [key: string]: unknown;
}

/** A manifest found on disk together with its parsed document */
export interface LocatedApplication {
  path: string;
  document: ApplicationManifest;
}

/** One manifest path to update, with the environment it was resolved for */
export interface ManifestTarget {
  environment?: string;
  path: string;
}

export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}
