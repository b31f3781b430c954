#!/usr/bin/env node

/**
 * argo-chart-bump CLI entry point
 *
 * Import order matters: program setup → routing → parse.
 */

import { program } from './program.js';
import './routing.js';
import { handleFatalError } from './errorHandler.js';

program.parseAsync().catch((err: unknown) => {
  process.exitCode = handleFatalError(err);
});
