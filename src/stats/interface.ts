/**
 * Stats facade interface
 */

import type { Tags } from '../types/index.js';

/**
 * Application-facing stats API.
 *
 * Tags given to a call are added to the tags bound with `addTags`; scoped
 * instances prefix stat names with their scope.
 */
export interface Stats {
  /** Add to a counter */
  count(name: string, value: number, tags?: Tags): void;

  /** Set a gauge */
  gauge(name: string, value: number, tags?: Tags): void;

  /** Record a histogram sample */
  histogram(name: string, value: number, tags?: Tags): void;

  /** Record a timing in milliseconds */
  timing(name: string, durationMs: number, tags?: Tags): void;

  /** Bind tags to every subsequent stat of this instance */
  addTags(tags: Tags): void;

  /** Derive a Stats whose names are prefixed by the given scope */
  scope(...names: string[]): Stats;

  /**
   * Run `fn` and record its duration as a timing, whether it resolves
   * or throws
   */
  time<T>(name: string, fn: () => T | Promise<T>, tags?: Tags): Promise<T>;

  /** Close the underlying sender */
  close(): Promise<void>;
}
