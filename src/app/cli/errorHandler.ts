/**
 * Top-level error handler
 *
 * The only place where errors turn into process output and exit codes.
 */

import {
  EXIT_CONFIG_ERROR,
  EXIT_DATA_ERROR,
  EXIT_GENERAL_ERROR,
  EXIT_GIT_OPERATION_FAILED,
  EXIT_RESOLUTION_FAILED,
} from '../../exitCodes.js';
import { error } from '../../shared/ui/index.js';
import { createLogger, getErrorMessage, GitCommandError, isArgoChartBumpError } from '../../shared/utils/index.js';

const log = createLogger('cli');

/**
 * Exit code for a failed run.
 * git failures exit with git's own status when it has one.
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof GitCommandError) {
    return err.exitCode !== undefined && err.exitCode !== 0 ? err.exitCode : EXIT_GIT_OPERATION_FAILED;
  }
  if (!isArgoChartBumpError(err)) {
    return EXIT_GENERAL_ERROR;
  }
  switch (err.kind) {
    case 'config':
      return EXIT_CONFIG_ERROR;
    case 'resolution':
      return EXIT_RESOLUTION_FAILED;
    case 'data':
      return EXIT_DATA_ERROR;
    case 'git':
      return EXIT_GIT_OPERATION_FAILED;
  }
}

/**
 * Report a failed run and return its exit code.
 * git's own stderr and stdout are passed through verbatim.
 */
export function handleFatalError(err: unknown): number {
  const exitCode = exitCodeFor(err);
  log.error('Run failed', { error: getErrorMessage(err), exitCode });

  if (err instanceof GitCommandError) {
    if (err.stderr) process.stderr.write(err.stderr);
    if (err.stdout) process.stdout.write(err.stdout);
  }
  error(getErrorMessage(err));

  return exitCode;
}
