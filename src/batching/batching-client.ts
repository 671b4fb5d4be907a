/**
 * BatchingStatsClient - non-blocking, batching StatsClient.
 *
 * Each forward call accepts a single payload and resolves immediately,
 * reporting every stat as accepted. Stats are buffered per source until the
 * buffer holds at least `maxBatchSize` stats or `maxBatchDelay` has elapsed
 * since the oldest buffered stat arrived; the buffer is then forwarded as
 * one payload. Failures are logged, not reported to the caller.
 *
 * @example
 * ```typescript
 * const client = new BatchingStatsClient({
 *   forwarder,
 *   maxBatchDelay: 1_000,
 *   maxBatchSize: 100,
 * });
 *
 * await client.forward({ source: 'edge-1', stats });
 * await client.close(); // forwards what is still buffered
 * ```
 */

import type { ForwardResult, Logger, StatsPayload } from '../types/index.js';
import { validateBatchingConfig } from '../config/index.js';
import type { BatchingConfigInput } from '../config/index.js';
import { noopLogger } from '../logging/index.js';
import { systemTimeSource } from '../time/index.js';
import type { TimeSource } from '../time/index.js';
import { ClientStats } from './client-stats.js';
import type { StatsClient, StatsForwarder } from './interface.js';
import { PayloadBatcher } from './payload-batcher.js';

/**
 * Options for BatchingStatsClient
 */
export interface BatchingStatsClientOptions extends BatchingConfigInput {
  /** Issues the consolidated forwarding requests */
  forwarder: StatsForwarder;
  /** Source of time and deadline timers (default: system clock) */
  timeSource?: TimeSource;
  /** Logger for forwarding failures */
  logger?: Logger;
}

export class BatchingStatsClient implements StatsClient {
  readonly maxBatchDelay: number;
  readonly maxBatchSize: number;

  private readonly forwarder: StatsForwarder;
  private readonly timeSource: TimeSource;
  private readonly logger: Logger;
  private batchers: Map<string, PayloadBatcher> = new Map();

  /**
   * @throws ConfigurationError if maxBatchDelay < 1000 ms or maxBatchSize < 1
   */
  constructor(options: BatchingStatsClientOptions) {
    const config = validateBatchingConfig({
      maxBatchDelay: options.maxBatchDelay,
      maxBatchSize: options.maxBatchSize,
    });

    this.maxBatchDelay = config.maxBatchDelay;
    this.maxBatchSize = config.maxBatchSize;
    this.forwarder = options.forwarder;
    this.timeSource = options.timeSource ?? systemTimeSource;
    this.logger = options.logger ?? noopLogger;
  }

  forward(payload: StatsPayload): Promise<ForwardResult> {
    const batcher = this.getBatcher(payload.source) ?? this.newBatcher(payload.source);
    batcher.push(payload);

    return Promise.resolve({ numAccepted: payload.stats.length });
  }

  /**
   * Close every batcher, forwarding whatever each still buffers. Resolves
   * once all of their forwards have settled.
   */
  async close(): Promise<void> {
    const batchers = Array.from(this.batchers.values());
    this.batchers = new Map();

    await Promise.all(batchers.map((batcher) => batcher.close()));
  }

  stats(source: string, ...scope: string[]): ClientStats {
    return new ClientStats(this, source, scope, this.timeSource);
  }

  /**
   * Sources with a live batcher
   */
  sources(): string[] {
    return Array.from(this.batchers.keys());
  }

  getBatcher(source: string): PayloadBatcher | undefined {
    return this.batchers.get(source);
  }

  private newBatcher(source: string): PayloadBatcher {
    const batcher = new PayloadBatcher({
      source,
      forwarder: this.forwarder,
      maxDelay: this.maxBatchDelay,
      maxSize: this.maxBatchSize,
      timeSource: this.timeSource,
      logger: this.logger,
    });
    this.batchers.set(source, batcher);

    this.logger.debug('Created batcher', { source });
    return batcher;
  }
}
