/**
 * ForwardingStatsClient - StatsClient that forwards each payload as-is
 * and waits for the forwarder's result.
 */

import type { ForwardResult, StatsPayload } from '../types/index.js';
import { systemTimeSource } from '../time/index.js';
import type { TimeSource } from '../time/index.js';
import { ClientStats } from './client-stats.js';
import type { StatsClient, StatsForwarder } from './interface.js';

export class ForwardingStatsClient implements StatsClient {
  constructor(
    private readonly forwarder: StatsForwarder,
    private readonly timeSource: TimeSource = systemTimeSource
  ) {}

  forward(payload: StatsPayload): Promise<ForwardResult> {
    return this.forwarder.issueRequest(payload);
  }

  async close(): Promise<void> {}

  stats(source: string, ...scope: string[]): ClientStats {
    return new ClientStats(this, source, scope, this.timeSource);
  }
}
