/**
 * Errors raised while handing batched payloads to a forwarder.
 *
 * These never reach the caller that submitted the stats; they are built
 * for structured logging.
 */

import { LatchingStatsError } from './base.js';

/**
 * Error describing a failed forwarding attempt
 */
export class ForwardingError extends LatchingStatsError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: Error } = {}) {
    super({ category: 'forwarding', message, ...options });
    this.name = 'ForwardingError';
  }

  /**
   * The forwarder refused the request before it was issued
   */
  static enqueueFailed(source: string, size: number, cause: Error): ForwardingError {
    return new ForwardingError(`Failed to enqueue request for source '${source}'`, {
      details: { source, size },
      cause,
    });
  }

  /**
   * The issued request completed with an error
   */
  static requestFailed(source: string, size: number, cause: Error): ForwardingError {
    return new ForwardingError(`Failed to forward payload for source '${source}'`, {
      details: { source, size },
      cause,
    });
  }
}

/**
 * Error describing a backend sender call that threw during a flush
 */
export class EmissionError extends LatchingStatsError {
  constructor(metric: string, cause: Error) {
    super({
      category: 'emission',
      message: `Failed to emit metric '${metric}'`,
      details: { metric },
      cause,
    });
    this.name = 'EmissionError';
  }
}
