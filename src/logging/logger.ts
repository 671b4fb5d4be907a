/**
 * Logger implementations.
 *
 * Components accept the package's Logger interface. `createLogger` builds
 * one on top of pino; `noopLogger` is used wherever no logger was supplied.
 */

import { destination, pino } from 'pino';
import type { DestinationStream, Logger as PinoBaseLogger, LevelWithSilent } from 'pino';
import type { Logger } from '../types/index.js';

/**
 * Options for createLogger
 */
export interface LoggerOptions {
  /** Logger name, reported as `name` on every line */
  name?: string;
  /** Minimum level (defaults to 'info') */
  level?: LevelWithSilent;
  /** Fields bound to every line */
  bindings?: Record<string, unknown>;
  /** Output stream (defaults to stdout) */
  destination?: DestinationStream;
}

/**
 * Logger that forwards to a pino instance
 */
export class PinoLogger implements Logger {
  constructor(private readonly base: PinoBaseLogger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.base.debug(context ?? {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.base.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.base.warn(context ?? {}, message);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.base.error(context ?? {}, message);
  }

  /**
   * Create a child logger with additional context
   * @param bindings - Fields to always include
   */
  child(bindings: Record<string, unknown>): PinoLogger {
    return new PinoLogger(this.base.child(bindings));
  }
}

/**
 * Create a pino-backed logger
 */
export function createLogger(options: LoggerOptions = {}): PinoLogger {
  const base = pino(
    {
      name: options.name ?? 'latching-stats',
      level: options.level ?? 'info',
      base: options.bindings ?? {},
    },
    options.destination ?? destination(1)
  );
  return new PinoLogger(base);
}

/**
 * Logger that discards everything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
