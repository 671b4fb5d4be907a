/**
 * Default configuration values
 */

/**
 * Default window over which stats are latched (1 minute)
 */
export const DEFAULT_LATCH_WINDOW_MS = 60_000;

/**
 * Upper bound of the first histogram bucket (1 millisecond in fractional seconds)
 */
export const DEFAULT_HISTOGRAM_BASE_VALUE = 0.001;

/**
 * Number of buckets used when latching histograms and timings
 */
export const DEFAULT_HISTOGRAM_NUM_BUCKETS = 20;

/**
 * Default maximum time a batch waits before being forwarded
 */
export const DEFAULT_MAX_BATCH_DELAY_MS = 1_000;

/**
 * Smallest permitted batch delay
 */
export const MIN_MAX_BATCH_DELAY_MS = 1_000;

/**
 * Default number of stats that triggers an immediate forward
 */
export const DEFAULT_MAX_BATCH_SIZE = 100;
