/**
 * Error codes used throughout pplaces.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1, except external operation failures,
 * which propagate the exit code of the failed subprocess.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'PathNotFound'
  | 'NotARepository'
  | 'PermissionDenied'
  | 'CorruptRepository'
  | 'AlreadyExists'
  | 'ExternalOperationFailed'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all pplaces errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('NotARepository', 'No git repository at ./tmp', {
 *   details: { path: '/home/me/tmp' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a path given on the command line does not exist
 * or is not a directory.
 */
export class PathNotFoundError extends AppError {
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('PathNotFound', `Path does not exist or is not a directory: ${path}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when an operation requires a git repository at a path that lacks one.
 */
export class NotARepositoryError extends AppError {
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('NotARepository', `Not a git repository: ${path}`, options);
    this.path = path;
  }
}

/**
 * Error raised for a directory that cannot be read during traversal.
 * Recovered locally: reported as a scan warning.
 */
export class PermissionDeniedError extends AppError {
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('PermissionDenied', `Permission denied: ${path}`, options);
    this.path = path;
  }
}

/**
 * Error raised when git metadata is present but cannot be read.
 * Recovered locally: the repository is still reported with best-effort fields.
 */
export class CorruptRepositoryError extends AppError {
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('CorruptRepository', `Unreadable git metadata at ${path}: ${message}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when a clone target is already occupied.
 */
export class AlreadyExistsError extends AppError {
  public readonly path: string;

  constructor(path: string, message?: string, options: AppErrorOptions = {}) {
    super('AlreadyExists', message ?? `A repository already exists at ${path}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when a delegated git or hosting command fails.
 * Carries the exit code of the subprocess verbatim.
 */
export class ExternalOperationFailedError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ExternalOperationFailed', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Maps an error to the process exit code the CLI should terminate with.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  if (
    error instanceof ExternalOperationFailedError &&
    error.exitCode !== undefined &&
    error.exitCode > 0
  ) {
    return error.exitCode;
  }
  return 1;
}
