/**
 * StatsD sender - Sender implementation over a hot-shots client.
 *
 * Tags arrive as `key<tagDelimiter>value` strings and are handed to the
 * client in its `key:value` form. Wire encoding and transport belong to
 * hot-shots.
 */

import { StatsD } from 'hot-shots';
import type { ClientOptions } from 'hot-shots';
import type { Logger, Sender, Tag } from '../types/index.js';
import { DEFAULT_TAG_FORMAT, splitTag } from '../tags/index.js';
import type { TagFormat } from '../tags/index.js';
import { noopLogger } from '../logging/index.js';

/**
 * Simplified interface for hot-shots StatsD client
 */
export interface StatsDClient {
  increment(stat: string, value?: number, tags?: string[]): void;
  gauge(stat: string, value: number, tags?: string[]): void;
  histogram(stat: string, value: number, tags?: string[]): void;
  timing(stat: string, value: number, tags?: string[]): void;
  close(callback?: (error?: Error) => void): void;
}

export class StatsdSender implements Sender {
  private readonly tagFormat: TagFormat;

  constructor(
    private readonly client: StatsDClient,
    tagFormat: TagFormat = DEFAULT_TAG_FORMAT
  ) {
    this.tagFormat = tagFormat;
  }

  count(name: string, value: number, tags?: readonly Tag[]): void {
    this.client.increment(name, value, this.formatTags(tags));
  }

  gauge(name: string, value: number, tags?: readonly Tag[]): void {
    this.client.gauge(name, value, this.formatTags(tags));
  }

  histogram(name: string, value: number, tags?: readonly Tag[]): void {
    this.client.histogram(name, value, this.formatTags(tags));
  }

  timing(name: string, durationMs: number, tags?: readonly Tag[]): void {
    this.client.timing(name, durationMs, this.formatTags(tags));
  }

  /**
   * Close the underlying client, flushing its buffer
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private formatTags(tags?: readonly Tag[]): string[] | undefined {
    if (!tags || tags.length === 0) {
      return undefined;
    }
    return tags.map((tag) => {
      const [key, value] = splitTag(tag, this.tagFormat);
      return value === '' ? key : `${key}:${value}`;
    });
  }
}

/**
 * Options for createStatsdSender
 */
export interface StatsdSenderOptions {
  /** hot-shots client options (host, port, prefix, protocol, ...) */
  client?: ClientOptions;
  tagFormat?: TagFormat;
  /** Receives socket errors reported by the client */
  logger?: Logger;
}

/**
 * Create a StatsdSender with its own hot-shots client
 */
export function createStatsdSender(options: StatsdSenderOptions = {}): StatsdSender {
  const logger = options.logger ?? noopLogger;
  const client = new StatsD({
    ...options.client,
    errorHandler: (error: Error) => {
      logger.error('StatsD client error', { error: error.message });
    },
  });
  return new StatsdSender(client, options.tagFormat);
}
