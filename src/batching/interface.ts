/**
 * Stats client interfaces
 */

import type { ForwardResult, StatsPayload } from '../types/index.js';
import type { ClientStats } from './client-stats.js';

/**
 * Executor capability that issues forwarding requests to a remote
 * collector. A synchronous throw means the request could not be issued;
 * a rejected promise means the issued request failed.
 */
export interface StatsForwarder {
  issueRequest(payload: StatsPayload): Promise<ForwardResult>;
}

/**
 * Client that forwards stats payloads to a remote collector
 */
export interface StatsClient {
  /**
   * Forward the given payload
   */
  forward(payload: StatsPayload): Promise<ForwardResult>;

  /**
   * Close the client and release any resources it created
   */
  close(): Promise<void>;

  /**
   * Create a ClientStats that forwards through this client with the given
   * source and optional scope
   */
  stats(source: string, ...scope: string[]): ClientStats;
}
