/**
 * latching-stats
 *
 * Client-side metric aggregation in fixed time windows and per-source
 * batching of stats payloads ahead of a remote forwarder.
 *
 * @example
 * ```typescript
 * import { createLatchingSender, createStatsdSender, SenderStats } from 'latching-stats';
 *
 * const sender = createLatchingSender(createStatsdSender(), { window: 10_000 });
 * const stats = new SenderStats(sender);
 *
 * stats.count('requests', 1, { node: 'edge-1' });
 * await stats.close();
 * ```
 *
 * @module latching-stats
 */

// ============================================================================
// Latching Exports
// ============================================================================

export {
  LatchingSender,
  LATCHED_AT_METRIC,
  createLatchingSender,
  CounterAccumulator,
  GaugeAccumulator,
  HistogramAccumulator,
  bucketBounds,
  fingerprint,
} from './latching/index.js';
export type {
  LatchingSenderOptions,
  LatchingNodeSnapshot,
  LatchingDependencies,
  Accumulator,
} from './latching/index.js';

// ============================================================================
// Batching Exports
// ============================================================================

export {
  BatchingStatsClient,
  ForwardingStatsClient,
  PayloadBatcher,
  ClientStats,
} from './batching/index.js';
export type {
  StatsClient,
  StatsForwarder,
  BatchingStatsClientOptions,
  PayloadBatcherOptions,
  BatcherState,
} from './batching/index.js';

// ============================================================================
// Sender Exports
// ============================================================================

export { StatsdSender, createStatsdSender, LoggingSender, MultiSender } from './senders/index.js';
export type { StatsDClient, StatsdSenderOptions } from './senders/index.js';

// ============================================================================
// Stats Facade Exports
// ============================================================================

export { SenderStats } from './stats/index.js';
export type { Stats, SenderStatsOptions } from './stats/index.js';

// ============================================================================
// Configuration Exports
// ============================================================================

export {
  DEFAULT_LATCH_WINDOW_MS,
  DEFAULT_HISTOGRAM_BASE_VALUE,
  DEFAULT_HISTOGRAM_NUM_BUCKETS,
  DEFAULT_MAX_BATCH_DELAY_MS,
  DEFAULT_MAX_BATCH_SIZE,
  MIN_MAX_BATCH_DELAY_MS,
  latchingConfigSchema,
  batchingConfigSchema,
  validateLatchingConfig,
  validateBatchingConfig,
  latchingConfigFromEnvironment,
  batchingConfigFromEnvironment,
} from './config/index.js';
export type {
  LatchingConfig,
  LatchingConfigInput,
  BatchingConfig,
  BatchingConfigInput,
} from './config/index.js';

// ============================================================================
// Error Exports
// ============================================================================

export {
  LatchingStatsError,
  ConfigurationError,
  ForwardingError,
  EmissionError,
} from './errors/index.js';
export type { ErrorCategory, LatchingStatsErrorOptions } from './errors/index.js';

// ============================================================================
// Time, Tag and Logging Exports
// ============================================================================

export { SystemTimeSource, systemTimeSource } from './time/index.js';
export type { TimeSource, Timer } from './time/index.js';

export {
  TIMESTAMP_TAG,
  NODE_TAG,
  DEFAULT_TAG_FORMAT,
  kvTag,
  splitTag,
  tagsFromRecord,
  tagsToRecord,
} from './tags/index.js';
export type { TagFormat } from './tags/index.js';

export { PinoLogger, createLogger, noopLogger } from './logging/index.js';
export type { LoggerOptions } from './logging/index.js';

// ============================================================================
// Type Exports
// ============================================================================

export { isLatchableSender } from './types/index.js';
export type {
  Sender,
  LatchableSender,
  LatchedHistogram,
  Stat,
  StatsPayload,
  ForwardResult,
  Tag,
  Tags,
  TagValue,
  Logger,
} from './types/index.js';

// Testing utilities are published under the './testing' subpath.
