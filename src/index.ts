/**
 * argo-chart-bump
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Manifest location and update
export * from './core/manifest/index.js';
export * from './core/packages/index.js';

// Infrastructure
export * from './infra/config/index.js';
export * from './infra/git/index.js';
export * from './infra/github/index.js';
export { readYamlFile, writeYamlFile, serializeYaml, writeFileAtomic } from './infra/yaml/yamlFile.js';

// Run
export * from './features/bump/index.js';

// Errors
export {
  ArgoChartBumpError,
  ConfigurationError,
  ResolutionError,
  ManifestDataError,
  GitCommandError,
  getErrorMessage,
  type ErrorKind,
  type GitFailureDetails,
} from './shared/utils/error.js';
