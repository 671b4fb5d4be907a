/**
 * Root of the package's error hierarchy.
 *
 * Errors raised by the engine and the dispatcher are mostly logged rather
 * than thrown, so each one carries a category and structured details that
 * `toJSON` hands to the logger as context.
 */

export type ErrorCategory = 'configuration' | 'forwarding' | 'emission';

/**
 * Options shared by every LatchingStatsError subclass
 */
export interface LatchingStatsErrorOptions {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

export abstract class LatchingStatsError extends Error {
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(options: LatchingStatsErrorOptions) {
    super(options.message);
    this.name = 'LatchingStatsError';
    this.category = options.category;
    this.details = options.details;
    this.cause = options.cause;
  }

  /**
   * Log context for this error; the cause is reduced to its message
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
