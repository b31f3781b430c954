/**
 * Bump execution flow
 *
 * Orchestrates the full run:
 *   1. Clone the repository into a fresh temp directory
 *   2. Look up the package in the package index
 *   3. Locate and update every target manifest in memory
 *   4. Write the manifests
 *   5. Stage, commit & push
 *
 * Failures are thrown as typed errors; the CLI maps them to exit codes.
 */

import { findPackage, loadPackageIndex } from '../../core/packages/index.js';
import type { BumpInputs } from '../../core/models/index.js';
import { pushBranch } from '../../infra/git/index.js';
import { debug, info, success, status, blankLine } from '../../shared/ui/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { buildCommitMessage, cloneIntoWorkdir, createWorkdir, prepareUpdates, stageAndCommit, writeUpdates } from './steps.js';
import type { BumpExecutionOptions, BumpResult } from './types.js';

const log = createLogger('bump');

/**
 * Execute a full bump run.
 *
 * Returns how the run ended; a missing package is a successful no-op.
 * The caller announces the token for masking before calling this.
 */
export function executeBump(inputs: BumpInputs, options: BumpExecutionOptions = {}): BumpResult {
  log.info('ConfigLoaded', {
    packageName: inputs.packageName,
    version: inputs.version,
    branch: inputs.branch,
    chartName: inputs.chartName,
    resolveMode: inputs.resolveMode,
    multiEnvironment: inputs.multiEnvironment,
  });

  // --- Step 1: Clone ---
  const workdir = createWorkdir(options.tempRoot);
  info('Cloning repository...');
  cloneIntoWorkdir(inputs, workdir);
  log.info('Cloned', { workdir, branch: inputs.branch });

  // --- Step 2: Resolve package ---
  const index = loadPackageIndex(workdir, inputs.packageFilePath);
  const pkg = findPackage(index, inputs.packageName);
  if (!pkg) {
    info(`Package "${inputs.packageName}" not found in ${inputs.packageFilePath}; nothing to do.`);
    log.info('PackageNotFound', { packageName: inputs.packageName });
    return { status: 'package-not-found', workdir };
  }
  log.info('PackageResolved', { name: pkg.name, path: pkg.path });

  // --- Step 3: Locate & update in memory ---
  const updates = prepareUpdates(workdir, pkg, inputs);
  log.info('TargetsResolved', { targets: updates.map((u) => u.relativePath) });

  // --- Step 4: Write ---
  const files = writeUpdates(updates);
  for (const prepared of updates) {
    const envLabel = prepared.target.environment ? ` [${prepared.target.environment}]` : '';
    info(`Updated targetRevision to ${inputs.version} in ${prepared.relativePath}${envLabel}`);
    debug(`${prepared.relativePath}: ${prepared.update.location} ${prepared.update.previousRevision ?? '(unset)'} -> ${inputs.version}`);
    log.debug('Revision updated', { file: prepared.relativePath, ...prepared.update });
  }
  log.info('Updated', { files });

  // --- Step 5: Commit & push ---
  const environments = inputs.multiEnvironment
    ? updates.flatMap((u) => (u.target.environment ? [u.target.environment] : []))
    : undefined;
  const commitMessage = buildCommitMessage(inputs.packageName, inputs.version, environments);

  const commitHash = stageAndCommit(workdir, files, commitMessage);
  if (!commitHash) {
    info(`No changes to commit (targetRevision already set to ${inputs.version}).`);
    log.info('NoChanges');
    return { status: 'no-changes', workdir, files, commitMessage };
  }
  log.info('Committed', { commitHash, commitMessage });

  info(`Pushing to origin/${inputs.branch}...`);
  pushBranch(workdir, inputs.branch);
  success('Pushed changes successfully.');
  log.info('Pushed', { branch: inputs.branch, commitHash });

  // --- Summary ---
  blankLine();
  status('Package', inputs.packageName);
  status('Version', inputs.version);
  status('Commit', commitHash);
  status('Result', 'Pushed', 'green');

  return { status: 'pushed', workdir, files, commitMessage, commitHash };
}
