/**
 * Logging sender - writes every emission to a Logger at debug level.
 * Useful during development and as a latching sink in diagnostics.
 */

import type { LatchableSender, LatchedHistogram, Logger, Tag } from '../types/index.js';

export class LoggingSender implements LatchableSender {
  constructor(private readonly logger: Logger) {}

  count(name: string, value: number, tags?: readonly Tag[]): void {
    this.log('count', name, value, tags);
  }

  gauge(name: string, value: number, tags?: readonly Tag[]): void {
    this.log('gauge', name, value, tags);
  }

  histogram(name: string, value: number, tags?: readonly Tag[]): void {
    this.log('histogram', name, value, tags);
  }

  timing(name: string, durationMs: number, tags?: readonly Tag[]): void {
    this.log('timing', name, durationMs, tags);
  }

  latchedHistogram(name: string, histogram: LatchedHistogram, tags?: readonly Tag[]): void {
    this.logger.debug(`latched histogram ${name}`, {
      name,
      histogram,
      tags: tags ? [...tags] : [],
    });
  }

  private log(kind: string, name: string, value: number, tags?: readonly Tag[]): void {
    this.logger.debug(`${kind} ${name}: ${value}`, {
      name,
      value,
      tags: tags ? [...tags] : [],
    });
  }
}
