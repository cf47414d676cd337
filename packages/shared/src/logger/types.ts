/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout contextpack.
 *
 * @example
 * ```typescript
 * logger.info('Found exactly one instruction');
 * logger.debug('Search roots: 3');
 * logger.error(new Error('Failed'), 'Clipboard copy failed');
 *
 * // Create a child logger with additional context
 * const stageLogger = logger.child({ stage: 'definitions' });
 * ```
 */
export interface Logger {
  /** Log a debug message; only emitted when verbose output is enabled */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
