/**
 * Latched stat accumulators.
 *
 * Each accumulator folds the samples of one (name, tag set) within a single
 * latch window. They carry no synchronization of their own; the owning
 * latching node is the only writer.
 *
 * @module latching/accumulators
 */

import type { LatchedHistogram, Tag } from '../types/index.js';

/**
 * Sums all values added over the window; emitted as a single count.
 * Values are truncated to integers before being added.
 */
export class CounterAccumulator {
  readonly kind = 'counter' as const;
  value = 0;

  constructor(
    readonly name: string,
    readonly tags: readonly Tag[]
  ) {}

  add(v: number): void {
    this.value += Math.trunc(v);
  }
}

/**
 * Keeps the last value set over the window
 */
export class GaugeAccumulator {
  readonly kind = 'gauge' as const;
  value = 0;

  constructor(
    readonly name: string,
    readonly tags: readonly Tag[]
  ) {}

  set(v: number): void {
    this.value = v;
  }
}

/**
 * Buckets values into power-of-two bins and tracks count, sum, min and max.
 *
 * Bucket `i` has an upper bound of `baseValue * 2^i`. A value lands in the
 * first bucket whose bound is >= the value; a value beyond the last bound
 * is left out of the buckets but still counted in the aggregates.
 */
export class HistogramAccumulator {
  readonly kind = 'histogram' as const;
  readonly buckets: number[];
  count = 0;
  sum = 0;
  min = 0;
  max = 0;

  constructor(
    readonly name: string,
    readonly tags: readonly Tag[],
    numBuckets: number
  ) {
    this.buckets = new Array<number>(numBuckets).fill(0);
  }

  add(v: number, baseValue: number): void {
    const n = this.buckets.length;
    let bound = baseValue;
    let idx = 0;

    while (v > bound && idx < n) {
      idx++;
      bound *= 2;
    }

    if (idx < n) {
      this.buckets[idx]++;
    }

    this.count++;
    this.sum += v;
    if (this.count === 1) {
      this.min = v;
      this.max = v;
    } else {
      if (v < this.min) {
        this.min = v;
      }
      if (v > this.max) {
        this.max = v;
      }
    }
  }

  latch(baseValue: number): LatchedHistogram {
    return {
      baseValue,
      buckets: [...this.buckets],
      count: this.count,
      sum: this.sum,
      min: this.min,
      max: this.max,
    };
  }
}

export type Accumulator = CounterAccumulator | GaugeAccumulator | HistogramAccumulator;

/**
 * Upper bounds of each histogram bucket, in order
 */
export function bucketBounds(baseValue: number, numBuckets: number): number[] {
  const bounds: number[] = [];
  let bound = baseValue;
  for (let i = 0; i < numBuckets; i++) {
    bounds.push(bound);
    bound *= 2;
  }
  return bounds;
}
