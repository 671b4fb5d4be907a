/**
 * Configuration schemas and validation.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  DEFAULT_HISTOGRAM_BASE_VALUE,
  DEFAULT_HISTOGRAM_NUM_BUCKETS,
  DEFAULT_LATCH_WINDOW_MS,
  DEFAULT_MAX_BATCH_DELAY_MS,
  DEFAULT_MAX_BATCH_SIZE,
  MIN_MAX_BATCH_DELAY_MS,
} from './defaults.js';

/**
 * Zod schema for latching configuration.
 */
export const latchingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  window: z
    .number({ invalid_type_error: 'window must be a number of milliseconds' })
    .positive('window must be greater than 0')
    .default(DEFAULT_LATCH_WINDOW_MS),
  baseValue: z
    .number({ invalid_type_error: 'base-value must be a number' })
    .positive('base-value must be greater than 0')
    .default(DEFAULT_HISTOGRAM_BASE_VALUE),
  buckets: z
    .number({ invalid_type_error: 'buckets must be a number' })
    .int('buckets must be an integer')
    .gt(1, 'buckets must be greater than 1')
    .default(DEFAULT_HISTOGRAM_NUM_BUCKETS),
});

/**
 * Zod schema for batching configuration.
 */
export const batchingConfigSchema = z.object({
  maxBatchDelay: z
    .number({ invalid_type_error: 'max delay must be a number of milliseconds' })
    .min(MIN_MAX_BATCH_DELAY_MS, 'max delay must be at least 1 second')
    .default(DEFAULT_MAX_BATCH_DELAY_MS),
  maxBatchSize: z
    .number({ invalid_type_error: 'max size must be a number' })
    .int('max size must be an integer')
    .min(1, 'max size must be at least 1')
    .default(DEFAULT_MAX_BATCH_SIZE),
});

/**
 * Validated latching configuration
 */
export type LatchingConfig = z.output<typeof latchingConfigSchema>;

/**
 * Latching configuration as supplied by callers
 */
export type LatchingConfigInput = z.input<typeof latchingConfigSchema>;

/**
 * Validated batching configuration
 */
export type BatchingConfig = z.output<typeof batchingConfigSchema>;

/**
 * Batching configuration as supplied by callers
 */
export type BatchingConfigInput = z.input<typeof batchingConfigSchema>;

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(issue.message, {
      field,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

/**
 * Validate latching configuration and apply defaults
 *
 * @throws ConfigurationError if window <= 0, baseValue <= 0 or buckets <= 1
 */
export function validateLatchingConfig(config: LatchingConfigInput = {}): LatchingConfig {
  return parseOrThrow(latchingConfigSchema, config);
}

/**
 * Validate batching configuration and apply defaults
 *
 * @throws ConfigurationError if maxBatchDelay < 1000 ms or maxBatchSize < 1
 */
export function validateBatchingConfig(config: BatchingConfigInput = {}): BatchingConfig {
  return parseOrThrow(batchingConfigSchema, config);
}
