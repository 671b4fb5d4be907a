/**
 * SenderStats - Stats facade over any Sender.
 *
 * @example
 * ```typescript
 * const stats = new SenderStats(new LatchingSender(createStatsdSender()));
 * stats.addTags({ node: 'edge-1' });
 *
 * const http = stats.scope('proxy', 'http');
 * http.count('requests', 1, { status: 200 }); // proxy.http.requests
 * await http.time('upstream', () => callUpstream());
 * ```
 */

import type { Sender, Tag, Tags } from '../types/index.js';
import { DEFAULT_TAG_FORMAT, tagsFromRecord } from '../tags/index.js';
import type { TagFormat } from '../tags/index.js';
import { systemTimeSource } from '../time/index.js';
import type { TimeSource } from '../time/index.js';
import type { Stats } from './interface.js';

/**
 * Options for SenderStats
 */
export interface SenderStatsOptions {
  tagFormat?: TagFormat;
  /** Clock used by `time` */
  timeSource?: TimeSource;
  /** Scope segments prefixed to every name */
  scope?: readonly string[];
  /** Tags bound to every stat */
  tags?: Tags;
}

export class SenderStats implements Stats {
  private readonly tagFormat: TagFormat;
  private readonly timeSource: TimeSource;
  private readonly scopeNames: readonly string[];
  private readonly prefix: string;
  private boundTags: Tags;

  constructor(
    private readonly sender: Sender,
    options: SenderStatsOptions = {}
  ) {
    this.tagFormat = options.tagFormat ?? DEFAULT_TAG_FORMAT;
    this.timeSource = options.timeSource ?? systemTimeSource;
    this.scopeNames = options.scope ?? [];
    this.prefix = this.scopeNames.join(this.tagFormat.scopeDelimiter);
    this.boundTags = { ...options.tags };
  }

  count(name: string, value: number, tags?: Tags): void {
    this.sender.count(this.qualify(name), value, this.resolveTags(tags));
  }

  gauge(name: string, value: number, tags?: Tags): void {
    this.sender.gauge(this.qualify(name), value, this.resolveTags(tags));
  }

  histogram(name: string, value: number, tags?: Tags): void {
    this.sender.histogram(this.qualify(name), value, this.resolveTags(tags));
  }

  timing(name: string, durationMs: number, tags?: Tags): void {
    this.sender.timing(this.qualify(name), durationMs, this.resolveTags(tags));
  }

  addTags(tags: Tags): void {
    this.boundTags = { ...this.boundTags, ...tags };
  }

  scope(...names: string[]): Stats {
    return new SenderStats(this.sender, {
      tagFormat: this.tagFormat,
      timeSource: this.timeSource,
      scope: [...this.scopeNames, ...names],
      tags: this.boundTags,
    });
  }

  async time<T>(name: string, fn: () => T | Promise<T>, tags?: Tags): Promise<T> {
    const start = this.timeSource.now();
    try {
      return await fn();
    } finally {
      this.timing(name, this.timeSource.now() - start, tags);
    }
  }

  async close(): Promise<void> {
    await this.sender.close?.();
  }

  private qualify(name: string): string {
    return this.prefix === '' ? name : `${this.prefix}${this.tagFormat.scopeDelimiter}${name}`;
  }

  private resolveTags(tags?: Tags): Tag[] {
    return tagsFromRecord({ ...this.boundTags, ...tags }, this.tagFormat);
  }
}
