/**
 * Environment variable configuration
 */

import type { BatchingConfigInput, LatchingConfigInput } from './schema.js';

type Environment = Record<string, string | undefined>;

/**
 * Parse numeric environment variable
 *
 * @returns Parsed number or undefined if unset or invalid
 */
function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse boolean environment variable
 *
 * @returns Parsed boolean or undefined if unset or unrecognized
 */
function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {
    return true;
  }
  if (lower === 'false' || lower === '0' || lower === 'no') {
    return false;
  }

  return undefined;
}

/**
 * Create latching configuration from environment variables
 *
 * - STATS_LATCH - Enable latching
 * - STATS_LATCH_WINDOW_MS - Latch window in milliseconds
 * - STATS_LATCH_BASE_VALUE - Upper bound of the first histogram bucket
 * - STATS_LATCH_BUCKETS - Number of histogram buckets
 *
 * Values are not validated here; pass the result to validateLatchingConfig.
 */
export function latchingConfigFromEnvironment(env: Environment = process.env): LatchingConfigInput {
  const config: LatchingConfigInput = {};

  const enabled = parseBoolean(env.STATS_LATCH);
  if (enabled !== undefined) {
    config.enabled = enabled;
  }

  const window = parseNumber(env.STATS_LATCH_WINDOW_MS);
  if (window !== undefined) {
    config.window = window;
  }

  const baseValue = parseNumber(env.STATS_LATCH_BASE_VALUE);
  if (baseValue !== undefined) {
    config.baseValue = baseValue;
  }

  const buckets = parseNumber(env.STATS_LATCH_BUCKETS);
  if (buckets !== undefined) {
    config.buckets = buckets;
  }

  return config;
}

/**
 * Create batching configuration from environment variables
 *
 * - STATS_MAX_BATCH_DELAY_MS - Maximum batching delay in milliseconds
 * - STATS_MAX_BATCH_SIZE - Stats count that triggers an immediate forward
 */
export function batchingConfigFromEnvironment(env: Environment = process.env): BatchingConfigInput {
  const config: BatchingConfigInput = {};

  const maxBatchDelay = parseNumber(env.STATS_MAX_BATCH_DELAY_MS);
  if (maxBatchDelay !== undefined) {
    config.maxBatchDelay = maxBatchDelay;
  }

  const maxBatchSize = parseNumber(env.STATS_MAX_BATCH_SIZE);
  if (maxBatchSize !== undefined) {
    config.maxBatchSize = maxBatchSize;
  }

  return config;
}
