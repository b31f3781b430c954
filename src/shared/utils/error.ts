/**
 * Error handling utilities
 *
 * Every failure the tool reports on purpose is an ArgoChartBumpError.
 * The `kind` discriminator is what the CLI maps to an exit code.
 */

export type ErrorKind = 'config' | 'resolution' | 'data' | 'git';

export abstract class ArgoChartBumpError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid input, reported before any clone or write */
export class ConfigurationError extends ArgoChartBumpError {
  readonly kind = 'config';
}

/** A path, package target, or chart could not be resolved */
export class ResolutionError extends ArgoChartBumpError {
  readonly kind = 'resolution';
}

/** Malformed YAML or a document missing the fields the update needs */
export class ManifestDataError extends ArgoChartBumpError {
  readonly kind = 'data';

  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
  }
}

export interface GitFailureDetails {
  /** git subcommand, e.g. `clone` (never the full argv, which may hold credentials) */
  subcommand: string;
  /** Exit status of git, undefined when the process never produced one */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
}

export class GitCommandError extends ArgoChartBumpError {
  readonly kind = 'git';
  readonly subcommand: string;
  readonly exitCode: number | undefined;
  readonly stdout: string;
  readonly stderr: string;

  constructor(details: GitFailureDetails, reason?: string) {
    const status = details.exitCode === undefined ? '' : ` (exit ${details.exitCode})`;
    super(`git ${details.subcommand} failed${status}${reason ? `: ${reason}` : ''}`);
    this.subcommand = details.subcommand;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

export function isArgoChartBumpError(err: unknown): err is ArgoChartBumpError {
  return err instanceof ArgoChartBumpError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
