/**
 * Latching module exports
 */

export { LatchingSender, LATCHED_AT_METRIC } from './latching-sender.js';
export type { LatchingSenderOptions, LatchingNodeSnapshot } from './latching-sender.js';

export {
  CounterAccumulator,
  GaugeAccumulator,
  HistogramAccumulator,
  bucketBounds,
} from './accumulators.js';
export type { Accumulator } from './accumulators.js';

export { fingerprint } from './fingerprint.js';

export { createLatchingSender } from './factory.js';
export type { LatchingDependencies } from './factory.js';
