/**
 * Debug logging
 *
 * Scoped loggers write timestamped entries to stderr when verbose output
 * is on, and to DEBUG_LOG_FILE when one is configured.
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';

type DebugLevel = 'DEBUG' | 'INFO' | 'ERROR';

export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

function formatData(data: unknown): string {
  if (typeof data === 'string') return data;
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return '[Unable to serialize data]';
  }
}

/**
 * Debug logger singleton.
 * Loggers are created at import time; the file target is attached later
 * by `init`, once the run inputs are known.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private logFile: string | undefined;
  private initialized = false;
  private verboseConsole = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Attach the log file. Only the first call takes effect. */
  init(config?: DebugConfig): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;

    if (!config?.enabled || !config.logFile) {
      return;
    }

    this.logFile = config.logFile;
    mkdirSync(dirname(this.logFile), { recursive: true });
    const rule = '='.repeat(60);
    writeFileSync(
      this.logFile,
      [rule, 'argo-chart-bump debug log', `Started: ${new Date().toISOString()}`, rule, ''].join('\n'),
      'utf-8',
    );
  }

  setVerboseConsole(enabled: boolean): void {
    this.verboseConsole = enabled;
  }

  write(level: DebugLevel, component: string, message: string, data?: unknown): void {
    const timestamp = new Date().toISOString();

    if (this.verboseConsole) {
      process.stderr.write(`[${timestamp.slice(11, 23)}] [${level}] [${component}] ${message}\n`);
    }

    if (!this.logFile) {
      return;
    }

    let entry = `[${timestamp}] [${level}] [${component}] ${message}`;
    if (data !== undefined) {
      entry += `\n${formatData(data)}`;
    }

    try {
      appendFileSync(this.logFile, entry + '\n', 'utf-8');
    } catch (err) {
      // Logging must not interrupt the run
      process.stderr.write(`[debug-log] write failed: ${String(err)}\n`);
    }
  }

  createLogger(component: string): ScopedLogger {
    return {
      debug: (message, data) => this.write('DEBUG', component, message, data),
      info: (message, data) => this.write('INFO', component, message, data),
      error: (message, data) => this.write('ERROR', component, message, data),
    };
  }
}

export function initDebugLogger(config?: DebugConfig): void {
  DebugLogger.getInstance().init(config);
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function createLogger(component: string): ScopedLogger {
  return DebugLogger.getInstance().createLogger(component);
}
