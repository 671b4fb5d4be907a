/**
 * Error classes for the latching stats package.
 */

export { LatchingStatsError, toError } from './base.js';
export type { ErrorCategory, LatchingStatsErrorOptions } from './base.js';

export { ConfigurationError } from './configuration.js';

export { ForwardingError, EmissionError } from './forwarding.js';
