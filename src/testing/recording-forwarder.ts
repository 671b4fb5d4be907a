/**
 * Recording forwarder for testing
 *
 * @module testing/recording-forwarder
 */

import type { ForwardResult, StatsPayload } from '../types/index.js';
import type { StatsForwarder } from '../batching/index.js';

/**
 * How issueRequest responds:
 * - resolve: resolves with every stat accepted
 * - reject: records the payload and rejects
 * - throw: throws synchronously without recording
 * - hold: records the payload and resolves on `release()`
 */
export type ForwarderMode = 'resolve' | 'reject' | 'throw' | 'hold';

export class RecordingForwarder implements StatsForwarder {
  readonly payloads: StatsPayload[] = [];
  mode: ForwarderMode = 'resolve';
  error: Error = new Error('forward failed');

  private held: Array<() => void> = [];

  issueRequest(payload: StatsPayload): Promise<ForwardResult> {
    if (this.mode === 'throw') {
      throw this.error;
    }

    this.payloads.push(payload);
    const result: ForwardResult = { numAccepted: payload.stats.length };

    switch (this.mode) {
      case 'reject':
        return Promise.reject(this.error);
      case 'hold':
        return new Promise((resolve) => {
          this.held.push(() => resolve(result));
        });
      default:
        return Promise.resolve(result);
    }
  }

  /**
   * Resolve every held request
   */
  release(): void {
    for (const resolve of this.held.splice(0)) {
      resolve();
    }
  }

  /**
   * Number of held requests
   */
  get heldRequests(): number {
    return this.held.length;
  }

  /**
   * Stat counts of the recorded payloads, in order
   */
  sizes(): number[] {
    return this.payloads.map((payload) => payload.stats.length);
  }
}
