/**
 * Construct a sender from latching configuration.
 */

import type { Logger, Sender } from '../types/index.js';
import { validateLatchingConfig } from '../config/index.js';
import type { LatchingConfigInput } from '../config/index.js';
import type { TagFormat } from '../tags/index.js';
import type { TimeSource } from '../time/index.js';
import { LatchingSender } from './latching-sender.js';

/**
 * Collaborators handed to the LatchingSender when latching is enabled
 */
export interface LatchingDependencies {
  timeSource?: TimeSource;
  tagFormat?: TagFormat;
  logger?: Logger;
}

/**
 * Wrap `underlying` in a LatchingSender when latching is enabled; otherwise
 * return `underlying` unchanged.
 *
 * @throws ConfigurationError if the configuration is invalid, whether or not
 *   latching is enabled
 */
export function createLatchingSender(
  underlying: Sender,
  config: LatchingConfigInput = {},
  deps: LatchingDependencies = {}
): Sender {
  const validated = validateLatchingConfig(config);
  if (!validated.enabled) {
    return underlying;
  }

  return new LatchingSender(underlying, {
    window: validated.window,
    baseValue: validated.baseValue,
    buckets: validated.buckets,
    ...deps,
  });
}
