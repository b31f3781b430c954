/**
 * Default action routing
 *
 * Loads inputs, initializes logging, runs the bump, and turns the
 * outcome into an exit code.
 */

import { executeBump } from '../../features/bump/index.js';
import { loadInputs } from '../../infra/config/index.js';
import { announceSecret } from '../../infra/github/index.js';
import { EXIT_SUCCESS } from '../../exitCodes.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { createLogger, initDebugLogger, setVerboseConsole } from '../../shared/utils/index.js';
import type { EnvSource } from '../../infra/config/index.js';
import { handleFatalError } from './errorHandler.js';
import { cliVersion, program, toInputOverrides, type CliOptions } from './program.js';

const log = createLogger('cli');

/**
 * Run the bump for the given flags and environment.
 * Never throws; returns the process exit code.
 */
export function executeDefaultAction(opts: CliOptions, env: EnvSource = process.env): number {
  try {
    const inputs = loadInputs(env, toInputOverrides(opts));
    announceSecret(inputs.token);

    initDebugLogger({ enabled: inputs.debugLogFile !== undefined, logFile: inputs.debugLogFile });
    if (inputs.verbose) {
      setVerboseConsole(true);
      setLogLevel('debug');
    }
    log.info('argo-chart-bump starting', { version: cliVersion });

    executeBump(inputs);
    return EXIT_SUCCESS;
  } catch (err) {
    return handleFatalError(err);
  }
}

program.action((opts: CliOptions) => {
  process.exitCode = executeDefaultAction(opts);
});
