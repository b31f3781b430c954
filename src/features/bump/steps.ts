/**
 * Bump step implementations
 *
 * Each function encapsulates one step of the run,
 * keeping the orchestrator at a consistent abstraction level.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, relative } from 'node:path';
import { resolveApplicationPath, updateTargetRevision } from '../../core/manifest/index.js';
import { resolveTargets } from '../../core/packages/index.js';
import type { BumpInputs, PackageEntry } from '../../core/models/index.js';
import { buildAuthUrl, cloneRepository, commitStaged, configureIdentity, stageFiles } from '../../infra/git/index.js';
import { writeYamlFile } from '../../infra/yaml/yamlFile.js';
import type { PreparedUpdate } from './types.js';

const WORKDIR_PREFIX = 'argo-chart-bump-';

/** Create the isolated directory the repository is cloned into. */
export function createWorkdir(tempRoot: string = tmpdir()): string {
  return mkdtempSync(join(tempRoot, WORKDIR_PREFIX));
}

export function cloneIntoWorkdir(inputs: BumpInputs, workdir: string): void {
  cloneRepository({
    url: buildAuthUrl(inputs.repoUrl, inputs.token),
    branch: inputs.branch,
    destination: workdir,
    cwd: dirname(workdir),
  });
}

/**
 * Locate and update every target manifest in memory.
 * Nothing is written here, so a failure on any target leaves the clone untouched.
 */
export function prepareUpdates(workdir: string, pkg: PackageEntry, inputs: BumpInputs): PreparedUpdate[] {
  const targets = resolveTargets(pkg.path, {
    environment: inputs.environment,
    multiEnvironment: inputs.multiEnvironment,
    environments: inputs.environments,
  });

  return targets.map((target) => {
    const located = resolveApplicationPath(workdir, target.path, {
      chartName: inputs.chartName,
      mode: inputs.resolveMode,
    });
    const relativePath = relative(workdir, located.path);
    const update = updateTargetRevision(located.document, inputs.version, inputs.chartName, relativePath);
    return { target, located, relativePath, update };
  });
}

/** Write every prepared manifest. Returns the distinct relative paths written. */
export function writeUpdates(updates: readonly PreparedUpdate[]): string[] {
  const written: string[] = [];
  for (const prepared of updates) {
    writeYamlFile(prepared.located.path, prepared.located.document);
    if (!written.includes(prepared.relativePath)) {
      written.push(prepared.relativePath);
    }
  }
  return written;
}

export function buildCommitMessage(packageName: string, version: string, environments?: readonly string[]): string {
  const message = `chore(helm): update ${packageName} to ${version}`;
  if (!environments || environments.length === 0) {
    return message;
  }
  return `${message} (envs: ${environments.join(', ')})`;
}

/**
 * Configure the bot identity, stage each file and commit.
 * Returns the short commit hash, or undefined when the tree already matched.
 */
export function stageAndCommit(workdir: string, files: readonly string[], message: string): string | undefined {
  configureIdentity(workdir);
  stageFiles(workdir, files);
  return commitStaged(workdir, message);
}
