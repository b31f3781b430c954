/**
 * Commander program setup
 *
 * Creates the Command instance and registers the options that
 * mirror the run inputs. Flags take precedence over INPUT_<NAME>
 * and plain environment variables.
 */

import { createRequire } from 'node:module';
import { Command, Option } from 'commander';
import type { InputOverrides } from '../../infra/config/index.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

export { cliVersion };

/** Parsed commander options */
export interface CliOptions {
  repoUrl?: string;
  token?: string;
  packageFile?: string;
  packageName?: string;
  targetVersion?: string;
  chart?: string;
  branch?: string;
  environment?: string;
  multiEnvironment?: boolean;
  environments?: string;
  resolveMode?: string;
  verbose?: boolean;
  debugLog?: string;
}

export const program = new Command();

program
  .name('argo-chart-bump')
  .description('Update the targetRevision of an Argo CD Application and push the change')
  .version(cliVersion);

program
  .option('--repo-url <url>', 'Repository URL (HTTPS or git@host:path) [REPO_URL]')
  .option('--token <token>', 'Access token used for clone and push [TOKEN]')
  .option('--package-file <path>', 'Package index file, relative to the repository root [PACKAGE_FILE_PATH]')
  .option('--package-name <name>', 'Package to update [PACKAGE_NAME]')
  .option('--target-version <version>', 'New targetRevision [VERSION]')
  .option('--chart <name>', 'Chart name selecting the source to update [CHART_NAME]')
  .option('-b, --branch <name>', 'Branch to clone and push (default: main) [BRANCH]')
  .option('-e, --environment <name>', 'Environment substituted for "$" in the package path [ENVIRONMENT]')
  .option('--multi-environment', 'Update the package path once per environment in --environments [MULTI_ENVIRONMENT]')
  .option('--environments <list>', 'Comma-separated environments for --multi-environment [ENVIRONMENTS]')
  .addOption(
    new Option('--resolve-mode <mode>', 'How the package path is resolved (default: file) [RESOLVE_MODE]')
      .choices(['file', 'scan']),
  )
  .option('-v, --verbose', 'Print debug logs to stderr [VERBOSE]')
  .option('--debug-log <path>', 'Write debug logs to a file [DEBUG_LOG_FILE]');

/** Map parsed flags onto input keys */
export function toInputOverrides(opts: CliOptions): InputOverrides {
  return {
    repoUrl: opts.repoUrl,
    token: opts.token,
    packageFilePath: opts.packageFile,
    packageName: opts.packageName,
    version: opts.targetVersion,
    chartName: opts.chart,
    branch: opts.branch,
    environment: opts.environment,
    multiEnvironment: opts.multiEnvironment,
    environments: opts.environments,
    resolveMode: opts.resolveMode,
    verbose: opts.verbose,
    debugLogFile: opts.debugLog,
  };
}
