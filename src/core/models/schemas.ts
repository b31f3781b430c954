/**
 * Zod schemas for package index and run inputs
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

/** Single entry of the package index; a missing, null or empty path means the repository root */
export const PackageEntrySchema = z.object({
  name: z.string().min(1),
  path: z.string().nullish().transform((path) => path || './'),
});

/** Package index file: top-level `packages` list */
export const PackageIndexSchema = z.object({
  packages: z.array(PackageEntrySchema),
});

/**
 * Minimal shape check for an Application manifest.
 * Only `kind` is validated; the parsed output is never used so that
 * the original document (and its key order) is what gets written back.
 */
export const ApplicationManifestSchema = z.looseObject({
  kind: z.literal('Application'),
});

export const ResolveModeSchema = z.enum(['file', 'scan']);

const requiredInput = z.string().min(1);

/** Inputs of a single run, after env/flag merging */
export const BumpInputsSchema = z.object({
  repoUrl: requiredInput,
  token: requiredInput,
  packageFilePath: requiredInput,
  packageName: requiredInput,
  version: requiredInput,
  chartName: z.string().min(1).optional(),
  branch: z.string().min(1).default('main'),
  environment: z.string().min(1).optional(),
  multiEnvironment: z.boolean().default(false),
  environments: z.string().optional(),
  resolveMode: ResolveModeSchema.default('file'),
  verbose: z.boolean().default(false),
  debugLogFile: z.string().min(1).optional(),
});
