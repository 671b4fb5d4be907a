/**
 * Multi sender - fans every emission out to several senders
 */

import type { Sender, Tag } from '../types/index.js';
import { toError } from '../errors/index.js';

export class MultiSender implements Sender {
  private readonly senders: readonly Sender[];

  constructor(senders: readonly Sender[]) {
    this.senders = [...senders];
  }

  count(name: string, value: number, tags?: readonly Tag[]): void {
    for (const sender of this.senders) {
      sender.count(name, value, tags);
    }
  }

  gauge(name: string, value: number, tags?: readonly Tag[]): void {
    for (const sender of this.senders) {
      sender.gauge(name, value, tags);
    }
  }

  histogram(name: string, value: number, tags?: readonly Tag[]): void {
    for (const sender of this.senders) {
      sender.histogram(name, value, tags);
    }
  }

  timing(name: string, durationMs: number, tags?: readonly Tag[]): void {
    for (const sender of this.senders) {
      sender.timing(name, durationMs, tags);
    }
  }

  /**
   * Close every sender. All are closed even if one fails; the first
   * failure is rethrown afterwards.
   */
  async close(): Promise<void> {
    const results = await Promise.allSettled(
      this.senders.map(async (sender) => {
        await sender.close?.();
      })
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        throw toError(result.reason);
      }
    }
  }
}
