/**
 * ClientStats - stats front end over a StatsClient.
 *
 * Each call forwards a single-stat payload for the bound source. Names are
 * prefixed with the scope segments joined by '/'.
 */

import { systemTimeSource } from '../time/index.js';
import type { TimeSource } from '../time/index.js';
import type { StatsClient } from './interface.js';

export class ClientStats {
  /** Resolved scope prefix ('' when unscoped) */
  readonly scope: string;

  constructor(
    private readonly client: StatsClient,
    readonly source: string,
    scope: readonly string[] = [],
    private readonly timeSource: TimeSource = systemTimeSource
  ) {
    this.scope = scope.join('/');
  }

  /**
   * Forward a counter increment
   */
  inc(name: string, value: number): Promise<void> {
    return this.stat(name, value);
  }

  /**
   * Forward a gauge value
   */
  gauge(name: string, value: number): Promise<void> {
    return this.stat(name, value);
  }

  /**
   * Forward a timing; the stat value is in seconds
   */
  timing(name: string, durationMs: number): Promise<void> {
    return this.stat(name, durationMs / 1000);
  }

  private async stat(name: string, value: number): Promise<void> {
    const qualified = this.scope !== '' ? `${this.scope}/${name}` : name;

    await this.client.forward({
      source: this.source,
      stats: [
        {
          name: qualified,
          value,
          timestamp: this.timeSource.now() * 1000,
        },
      ],
    });
  }
}
