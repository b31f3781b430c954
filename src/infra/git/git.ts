/**
 * git subprocess wrapper
 *
 * All calls are synchronous and run to completion. A non-zero exit is
 * raised as GitCommandError carrying git's own output and status. The
 * argv is never put into error messages since clone URLs carry a token.
 */

import { execFileSync } from 'node:child_process';
import { createLogger, GitCommandError, isRecord } from '../../shared/utils/index.js';

const log = createLogger('git');

export interface GitIdentity {
  name: string;
  email: string;
}

export const BOT_IDENTITY: GitIdentity = {
  name: 'github-actions[bot]',
  email: 'github-actions[bot]@users.noreply.github.com',
};

function outputToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
}

function toGitCommandError(subcommand: string, err: unknown): GitCommandError {
  if (!isRecord(err)) {
    return new GitCommandError({ subcommand, exitCode: undefined, stdout: '', stderr: '' }, String(err));
  }
  const exitCode = typeof err.status === 'number' ? err.status : undefined;
  // ENOENT and similar spawn failures carry a code but no status
  const reason = exitCode === undefined && typeof err.code === 'string' ? err.code : undefined;
  return new GitCommandError(
    {
      subcommand,
      exitCode,
      stdout: outputToString(err.stdout),
      stderr: outputToString(err.stderr),
    },
    reason,
  );
}

/**
 * Run `git <args>` in `cwd` and return its trimmed stdout.
 */
export function runGit(args: string[], cwd: string): string {
  const subcommand = args[0] ?? '';
  log.debug(`git ${subcommand}`, { cwd });
  try {
    const output = execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: 'pipe',
    });
    return outputToString(output).trim();
  } catch (err) {
    throw toGitCommandError(subcommand, err);
  }
}

export interface CloneOptions {
  /** Clone URL, possibly carrying credentials */
  url: string;
  branch: string;
  /** Destination directory; must be empty or absent */
  destination: string;
  /** Directory the clone command runs from */
  cwd: string;
}

/** Shallow single-branch clone (depth 1). */
export function cloneRepository(options: CloneOptions): void {
  runGit(
    ['clone', '--branch', options.branch, '--single-branch', '--depth', '1', options.url, options.destination],
    options.cwd,
  );
}

export function configureIdentity(cwd: string, identity: GitIdentity = BOT_IDENTITY): void {
  runGit(['config', 'user.name', identity.name], cwd);
  runGit(['config', 'user.email', identity.email], cwd);
}

/** Stage each path with its own `git add`. Paths are relative to `cwd`. */
export function stageFiles(cwd: string, relativePaths: readonly string[]): void {
  for (const relativePath of relativePaths) {
    runGit(['add', '--', relativePath], cwd);
  }
}

export function listStagedFiles(cwd: string): string[] {
  const output = runGit(['diff', '--cached', '--name-only'], cwd);
  return output.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
}

/**
 * Commit whatever is staged.
 * Returns the short commit hash, or undefined when nothing is staged.
 */
export function commitStaged(cwd: string, message: string): string | undefined {
  if (listStagedFiles(cwd).length === 0) {
    return undefined;
  }

  runGit(['commit', '-m', message], cwd);
  return runGit(['rev-parse', '--short', 'HEAD'], cwd);
}

export function pushBranch(cwd: string, branch: string, remote = 'origin'): void {
  log.info('Pushing branch', { remote, branch });
  runGit(['push', remote, branch], cwd);
}
