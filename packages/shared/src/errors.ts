/**
 * Error codes used throughout contextpack.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'NotFound'
  | 'Ambiguous'
  | 'UnsupportedMode'
  | 'RegexCompile'
  | 'ProcessError'
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
 * Base error class for all contextpack errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('NotFound', 'No instruction marker found', {
 *   details: { repoRoot: '/work/app' },
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
 * Error thrown when CLI usage is incorrect (unknown flags, invalid combinations,
 * a missing --root directory).
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when no file in the repository carries an instruction marker.
 */
export class InstructionNotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFound', message, options);
  }
}

/**
 * Error thrown when more than one file carries an instruction marker.
 */
export class AmbiguousInstructionError extends AppError {
  /** Absolute paths of every qualifying file */
  public readonly files: string[];

  constructor(files: string[], options: AppErrorOptions = {}) {
    super(
      'Ambiguous',
      `Found instruction markers in ${files.length} files; exactly one is allowed.`,
      { ...options, details: options.details ?? { files } },
    );
    this.files = files;
  }
}

/**
 * Error thrown when no repository root can be found above a directory.
 */
export class RepoRootError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFound', message, options);
  }
}

/**
 * Error thrown when a mode is requested for a file type that does not support it.
 */
export class UnsupportedModeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UnsupportedMode', message, options);
  }
}

/**
 * Error thrown when a generated search pattern cannot be compiled.
 */
export class RegexCompileError extends AppError {
  /** The pattern source that failed */
  public readonly pattern: string;

  constructor(pattern: string, options: AppErrorOptions = {}) {
    super('RegexCompile', `Failed to compile search pattern: ${pattern}`, options);
    this.pattern = pattern;
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Maps an error to the process exit code the CLI should use.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
