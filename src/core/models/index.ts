// Core models

export type {
  PackageEntry,
  PackageIndex,
  BumpInputs,
  ResolveMode,
  ApplicationSource,
  ApplicationManifest,
  LocatedApplication,
  ManifestTarget,
  DebugConfig,
} from './types.js';

export {
  PackageEntrySchema,
  PackageIndexSchema,
  ApplicationManifestSchema,
  ResolveModeSchema,
  BumpInputsSchema,
} from './schemas.js';
