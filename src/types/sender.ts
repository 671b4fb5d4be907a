/**
 * Backend sender capability.
 *
 * Anything that accepts named numeric samples with string tags: a statsd
 * socket writer, a pull registry, a remote collector client. The latching
 * engine both consumes and implements this shape.
 */

import type { Tag } from './common.js';

/**
 * Sink for raw or reduced metric emissions
 */
export interface Sender {
  /** Emit a counter increment */
  count(name: string, value: number, tags?: readonly Tag[]): void;

  /** Emit a gauge value */
  gauge(name: string, value: number, tags?: readonly Tag[]): void;

  /** Emit a histogram sample */
  histogram(name: string, value: number, tags?: readonly Tag[]): void;

  /** Emit a timing, in milliseconds */
  timing(name: string, durationMs: number, tags?: readonly Tag[]): void;

  /** Release resources held by the sender */
  close?(): Promise<void> | void;
}

/**
 * Client-aggregated histogram for one latch window.
 *
 * Bucket `i` counts values no greater than `baseValue * 2^i`; values above
 * the last bound are only reflected in count, sum, min and max.
 */
export interface LatchedHistogram {
  baseValue: number;
  buckets: number[];
  count: number;
  sum: number;
  min: number;
  max: number;
}

/**
 * Sender that accepts a pre-aggregated histogram in a single call
 */
export interface LatchableSender extends Sender {
  latchedHistogram(name: string, histogram: LatchedHistogram, tags?: readonly Tag[]): void;
}

/**
 * Type guard for senders advertising the latched histogram capability
 */
export function isLatchableSender(sender: Sender): sender is LatchableSender {
  return 'latchedHistogram' in sender && typeof sender.latchedHistogram === 'function';
}
