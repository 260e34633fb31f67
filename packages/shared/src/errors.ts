/**
 * Error codes used throughout the release pipeline.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ResolutionError'
  | 'ProcessError'
  | 'FileIOError'
  | 'PartialBuildError'
  | 'VerificationError'
  | 'StageError'
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
 * Base error class for all pipeline errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('FileIOError', 'Failed to read template', {
 *   cause: originalError,
 *   details: { path: 'templates/install.sh' }
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
 * Error thrown when the descriptor or user config is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when a configuration file is not well-formed structured text.
 */
export class ParseError extends ConfigError {}

/**
 * Error thrown when a required configuration field is absent or empty.
 */
export class MissingFieldError extends ConfigError {
  /** Dotted path of the missing field */
  public readonly field: string;

  constructor(field: string, message: string, options: AppErrorOptions = {}) {
    super(message, options);
    this.field = field;
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
 * Error thrown when no signing identity can be resolved from the
 * descriptor or the per-user config.
 */
export class ResolutionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ResolutionError', message, options);
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code and captured output when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;
  /** Combined stdout/stderr of the failed process */
  public readonly output?: string;

  constructor(
    message: string,
    options: AppErrorOptions & { exitCode?: number; output?: string } = {},
  ) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
    this.output = options.output;
  }
}

/**
 * Error thrown when reading or writing an artifact fails.
 */
export class FileIOError extends AppError {
  /** Path of the file involved */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('FileIOError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when the compiler reported success but expected binaries
 * are absent from disk.
 */
export class PartialBuildError extends AppError {
  public readonly missing: string[];

  constructor(missing: string[], options: AppErrorOptions = {}) {
    super('PartialBuildError', `Compiler failed to build binaries: ${missing.join(', ')}`, options);
    this.missing = missing;
  }
}

/**
 * Error thrown when a freshly produced signature does not verify.
 */
export class VerificationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('VerificationError', message, options);
  }
}

/**
 * Error thrown by the pipeline when a stage fails.
 * Keeps the code of the underlying AppError so callers can still branch on it.
 */
export class StageError extends AppError {
  /** Name of the stage that failed */
  public readonly stage: string;

  constructor(stage: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(cause instanceof AppError ? cause.code : 'StageError', `${stage} stage failed: ${message}`, {
      cause,
      details: cause instanceof AppError ? cause.details : undefined,
    });
    this.stage = stage;
  }
}

/**
 * Returns true for errors the user can fix by changing input or configuration.
 */
export function isUserError(error: unknown): boolean {
  return error instanceof AppError && (error.code === 'ConfigError' || error.code === 'UsageError');
}
