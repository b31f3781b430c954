/**
 * UI utilities for terminal output, re-exported.
 */

export {
  LogManager,
  type LogLevel,
  setLogLevel,
  blankLine,
  debug,
  info,
  error,
  success,
  status,
} from './LogManager.js';
