/**
 * Configuration module exports
 */

export {
  DEFAULT_LATCH_WINDOW_MS,
  DEFAULT_HISTOGRAM_BASE_VALUE,
  DEFAULT_HISTOGRAM_NUM_BUCKETS,
  DEFAULT_MAX_BATCH_DELAY_MS,
  DEFAULT_MAX_BATCH_SIZE,
  MIN_MAX_BATCH_DELAY_MS,
} from './defaults.js';
export {
  latchingConfigSchema,
  batchingConfigSchema,
  validateLatchingConfig,
  validateBatchingConfig,
} from './schema.js';
export type {
  LatchingConfig,
  LatchingConfigInput,
  BatchingConfig,
  BatchingConfigInput,
} from './schema.js';
export { latchingConfigFromEnvironment, batchingConfigFromEnvironment } from './env.js';
