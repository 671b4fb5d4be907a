/**
 * PayloadBatcher - per-source buffer with size and deadline triggers.
 * ----------------------------------------------------------------------------
 * Buffers the stats of every payload pushed for one source and forwards them
 * as a single payload once the buffer reaches `maxSize` stats or `maxDelay`
 * milliseconds have passed since the first stat of the batch arrived.
 *
 * STATES:
 *   idle      → no deadline armed
 *   buffering → deadline armed, waiting for size or time trigger
 *   draining  → close in progress, remaining stats being forwarded
 *   closed    → terminated; further pushes are dropped
 *
 * Forwarding failures are logged and never reported to whoever pushed the
 * stats.
 *
 * @module batching/payload-batcher
 */

import type { ForwardResult, Logger, Stat, StatsPayload } from '../types/index.js';
import { ForwardingError, toError } from '../errors/index.js';
import type { Timer, TimeSource } from '../time/index.js';
import type { StatsForwarder } from './interface.js';

export type BatcherState = 'idle' | 'buffering' | 'draining' | 'closed';

/**
 * Options for PayloadBatcher
 */
export interface PayloadBatcherOptions {
  source: string;
  forwarder: StatsForwarder;
  /** Deadline in milliseconds, armed by the first stat of a batch */
  maxDelay: number;
  /** Stats count that triggers an immediate forward */
  maxSize: number;
  timeSource: TimeSource;
  logger: Logger;
}

export class PayloadBatcher {
  readonly source: string;

  private readonly forwarder: StatsForwarder;
  private readonly maxDelay: number;
  private readonly maxSize: number;
  private readonly timeSource: TimeSource;
  private readonly logger: Logger;

  private buffer: Stat[] = [];
  private timer: Timer | undefined;
  private currentState: BatcherState = 'idle';
  private readonly inFlight: Set<Promise<void>> = new Set();

  constructor(options: PayloadBatcherOptions) {
    this.source = options.source;
    this.forwarder = options.forwarder;
    this.maxDelay = options.maxDelay;
    this.maxSize = options.maxSize;
    this.timeSource = options.timeSource;
    this.logger = options.logger;
  }

  get state(): BatcherState {
    return this.currentState;
  }

  /**
   * Number of stats waiting in the buffer
   */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Append a payload's stats to the buffer
   */
  push(payload: StatsPayload): void {
    if (this.currentState === 'draining' || this.currentState === 'closed') {
      this.logger.warn('Dropping payload pushed to closed batcher', {
        source: this.source,
        size: payload.stats.length,
      });
      return;
    }

    for (const stat of payload.stats) {
      this.buffer.push(stat);
    }

    if (this.buffer.length >= this.maxSize) {
      this.stopTimer();
      this.flush();
    } else if (!this.timer) {
      this.armTimer();
    }
  }

  /**
   * Forward any buffered stats, stop the deadline and terminate.
   * Resolves once every forward issued by this batcher has settled.
   */
  close(): Promise<void> {
    if (this.currentState !== 'draining' && this.currentState !== 'closed') {
      this.currentState = 'draining';
      if (this.buffer.length > 0) {
        this.flush();
      }
      this.stopTimer();
      this.currentState = 'closed';
    }

    return this.drained();
  }

  /**
   * Resolves when all in-flight forwards have settled
   */
  async drained(): Promise<void> {
    await Promise.all(this.inFlight);
  }

  private armTimer(): void {
    const timer = this.timeSource.newTimer(this.maxDelay, () => {
      // a stopped or superseded timer must not act on a newer buffer
      if (this.timer === timer) {
        this.onDeadline();
      }
    });
    this.timer = timer;
    this.currentState = 'buffering';
  }

  private stopTimer(): void {
    if (this.timer) {
      this.timer.stop();
      this.timer = undefined;
    }
    if (this.currentState === 'buffering') {
      this.currentState = 'idle';
    }
  }

  private onDeadline(): void {
    this.timer = undefined;
    this.currentState = 'idle';
    if (this.buffer.length > 0) {
      this.flush();
    }
  }

  private flush(): void {
    const payload: StatsPayload = { source: this.source, stats: this.buffer };
    const size = payload.stats.length;
    this.buffer = [];

    let request: Promise<ForwardResult>;
    try {
      request = this.forwarder.issueRequest(payload);
    } catch (err) {
      const error = ForwardingError.enqueueFailed(this.source, size, toError(err));
      this.logger.error(error.message, error.toJSON());
      return;
    }

    const tracked: Promise<void> = request
      .then(
        (result) => {
          this.logger.debug('Forwarded payload', {
            source: this.source,
            size,
            accepted: result.numAccepted,
          });
        },
        (err: unknown) => {
          const error = ForwardingError.requestFailed(this.source, size, toError(err));
          this.logger.error(error.message, error.toJSON());
        }
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
