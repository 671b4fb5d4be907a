/**
 * Configuration-related errors.
 *
 * Raised at construction or validation time, before any engine or
 * dispatcher instance exists.
 */

import { LatchingStatsError } from './base.js';

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends LatchingStatsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ category: 'configuration', message, details });
    this.name = 'ConfigurationError';
  }
}
