/**
 * LatchingSender - client-side aggregation of stats over fixed windows.
 * ----------------------------------------------------------------------------
 * Wraps an underlying Sender. For each counter it emits a single value
 * containing the count for the whole window. For each gauge it emits the last
 * value seen during the window. Timings and histogram values are bucketed
 * into a power-of-two histogram that is emitted either as one count per
 * bucket plus count, sum, min and max stats, or, when the underlying sender
 * is a LatchableSender, as a single latched histogram. Stats are equivalent
 * when they share kind, name and tag set.
 *
 * A `timestamp` tag holding epoch milliseconds overrides the sample time.
 * A `node` tag selects an independent aggregation partition, so producers
 * sharing one sender never share windows.
 *
 * WINDOW LIFECYCLE (per node):
 *   [first sample opens window] → samples fold into accumulators
 *     → [sample past the boundary] → window flushed, latched_at emitted
 *     → accumulators cleared, window advanced to the sample's boundary
 *
 * Every sender call is synchronous, so a partition's state is never
 * observed mid-update; partitions need no locking of their own.
 *
 * @module latching/latching-sender
 */

import type { LatchedHistogram, Logger, Sender, Tag } from '../types/index.js';
import { isLatchableSender } from '../types/index.js';
import { validateLatchingConfig } from '../config/index.js';
import { EmissionError, toError } from '../errors/index.js';
import { noopLogger } from '../logging/index.js';
import { DEFAULT_TAG_FORMAT, NODE_TAG, TIMESTAMP_TAG, kvTag, splitTag } from '../tags/index.js';
import type { TagFormat } from '../tags/index.js';
import { systemTimeSource } from '../time/index.js';
import type { TimeSource } from '../time/index.js';
import {
  CounterAccumulator,
  GaugeAccumulator,
  HistogramAccumulator,
  bucketBounds,
} from './accumulators.js';
import { fingerprint } from './fingerprint.js';

/**
 * Name of the synthetic gauge reporting when a window was latched
 */
export const LATCHED_AT_METRIC = 'latched_at';

/**
 * Options for LatchingSender
 */
export interface LatchingSenderOptions {
  /** Window duration in milliseconds (default: 60000, must be > 0) */
  window?: number;
  /** Upper bound of the first histogram bucket (default: 0.001, must be > 0) */
  baseValue?: number;
  /** Number of histogram buckets (default: 20, must be > 1) */
  buckets?: number;
  /** Source of the current time (default: system clock) */
  timeSource?: TimeSource;
  /** Tag and scope delimiters (default: '=' and '.') */
  tagFormat?: TagFormat;
  /** Logger for downstream emission failures */
  logger?: Logger;
}

/**
 * Aggregation state for one node partition
 */
interface LatchingNode {
  /** Start of the open window; undefined until the first sample */
  latchStart: number | undefined;
  counters: Map<string, CounterAccumulator>;
  gauges: Map<string, GaugeAccumulator>;
  histograms: Map<string, HistogramAccumulator>;
}

/**
 * Diagnostic view of a node partition
 */
export interface LatchingNodeSnapshot {
  /** Node tag value ('' for samples without one) */
  node: string;
  /** Start of the open window in epoch milliseconds */
  latchStart: number | undefined;
  counters: number;
  gauges: number;
  histograms: number;
}

/**
 * Sample tags after latching-specific tags have been extracted
 */
interface LatchedTags {
  /** Sorted tags, without a valid timestamp tag */
  tags: Tag[];
  /** Node partition key */
  node: string;
  /** Explicit sample time, if one was supplied */
  timestamp: number | undefined;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Render a bucket bound in shortest form, switching to exponent notation
 * (two-digit exponent) below 1e-4 and from 1e6 up.
 */
function formatBound(bound: number): string {
  const [mantissa, exponent] = bound.toExponential().split('e');
  const exp = Number(exponent);
  if (exp >= -4 && exp < 6) {
    return String(bound);
  }
  const sign = exp < 0 ? '-' : '+';
  return `${mantissa}e${sign}${String(Math.abs(exp)).padStart(2, '0')}`;
}

export class LatchingSender implements Sender {
  readonly window: number;
  readonly baseValue: number;
  readonly numBuckets: number;

  private readonly underlying: Sender;
  private readonly timeSource: TimeSource;
  private readonly tagFormat: TagFormat;
  private readonly logger: Logger;

  private nodes: Map<string, LatchingNode> = new Map();
  private closed = false;

  /**
   * @throws ConfigurationError if window, baseValue or buckets are invalid
   */
  constructor(underlying: Sender, options: LatchingSenderOptions = {}) {
    const config = validateLatchingConfig({
      window: options.window,
      baseValue: options.baseValue,
      buckets: options.buckets,
    });

    this.underlying = underlying;
    this.window = config.window;
    this.baseValue = config.baseValue;
    this.numBuckets = config.buckets;
    this.timeSource = options.timeSource ?? systemTimeSource;
    this.tagFormat = options.tagFormat ?? DEFAULT_TAG_FORMAT;
    this.logger = options.logger ?? noopLogger;
  }

  count(name: string, value: number, tags: readonly Tag[] = []): void {
    const latch = this.prepareLatch(name, tags);
    if (!latch) {
      return;
    }

    const { node, id, latchedTags } = latch;
    let c = node.counters.get(id);
    if (!c) {
      c = new CounterAccumulator(name, latchedTags);
      node.counters.set(id, c);
    }

    c.add(value);
  }

  gauge(name: string, value: number, tags: readonly Tag[] = []): void {
    const latch = this.prepareLatch(name, tags);
    if (!latch) {
      return;
    }

    const { node, id, latchedTags } = latch;
    let g = node.gauges.get(id);
    if (!g) {
      g = new GaugeAccumulator(name, latchedTags);
      node.gauges.set(id, g);
    }

    g.set(value);
  }

  histogram(name: string, value: number, tags: readonly Tag[] = []): void {
    const latch = this.prepareLatch(name, tags);
    if (!latch) {
      return;
    }

    const { node, id, latchedTags } = latch;
    let h = node.histograms.get(id);
    if (!h) {
      h = new HistogramAccumulator(name, latchedTags, this.numBuckets);
      node.histograms.set(id, h);
    }

    h.add(value, this.baseValue);
  }

  /**
   * Record a timing. Durations are latched as histograms in seconds.
   */
  timing(name: string, durationMs: number, tags: readonly Tag[] = []): void {
    this.histogram(name, durationMs / 1000, tags);
  }

  /**
   * Flush every node's open window, then close the underlying sender.
   * Only the underlying sender's close failure is reported.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const now = this.timeSource.now();
    for (const [nodeTag, node] of this.nodes) {
      this.completeLatch(node, nodeTag, this.truncate(now));
    }
    this.nodes = new Map();

    if (this.underlying.close) {
      await this.underlying.close();
    }
  }

  /**
   * Per-node view of open windows and live accumulators
   */
  snapshot(): LatchingNodeSnapshot[] {
    return Array.from(this.nodes, ([node, state]) => ({
      node,
      latchStart: state.latchStart,
      counters: state.counters.size,
      gauges: state.gauges.size,
      histograms: state.histograms.size,
    }));
  }

  private latchingNode(nodeTag: string): LatchingNode {
    let node = this.nodes.get(nodeTag);
    if (!node) {
      node = {
        latchStart: undefined,
        counters: new Map(),
        gauges: new Map(),
        histograms: new Map(),
      };
      this.nodes.set(nodeTag, node);
    }
    return node;
  }

  /**
   * Resolve the sample's partition, rolling its window forward if the sample
   * belongs to a later window.
   */
  private prepareLatch(
    name: string,
    tags: readonly Tag[]
  ): { node: LatchingNode; id: string; latchedTags: Tag[] } | undefined {
    if (this.closed) {
      this.logger.warn('Dropping stat submitted after close', { metric: name });
      return undefined;
    }

    const latched = this.latchedTags(tags);
    const ts = latched.timestamp ?? this.timeSource.now();
    const id = fingerprint(name, latched.tags);
    const node = this.latchingNode(latched.node);

    const newStart = this.truncate(ts);
    if (node.latchStart === undefined) {
      this.completeLatch(node, latched.node, newStart);
    } else if (newStart >= node.latchStart + this.window) {
      // Windows between the open one and newStart hold no samples and emit
      // nothing, so a single completion covers the whole gap.
      this.completeLatch(node, latched.node, newStart);
    }

    return { node, id, latchedTags: latched.tags };
  }

  private truncate(ts: number): number {
    return Math.floor(ts / this.window) * this.window;
  }

  /**
   * Complete the node's open window by emitting every accumulated stat and
   * a latched_at gauge, then start the next window at `nextLatchStart`.
   */
  private completeLatch(node: LatchingNode, nodeTag: string, nextLatchStart: number): void {
    const latchStart = node.latchStart;
    if (latchStart !== undefined) {
      this.flushNode(node, nodeTag, latchStart);
    }

    node.latchStart = nextLatchStart;
    node.counters = new Map();
    node.gauges = new Map();
    node.histograms = new Map();
  }

  private flushNode(node: LatchingNode, nodeTag: string, latchStart: number): void {
    let sent = 0;

    for (const c of node.counters.values()) {
      const tags = this.tagsWithTimestamp(c.tags, latchStart);
      this.send(c.name, () => this.underlying.count(c.name, c.value, tags));
      sent++;
    }

    for (const g of node.gauges.values()) {
      const tags = this.tagsWithTimestamp(g.tags, latchStart);
      this.send(g.name, () => this.underlying.gauge(g.name, g.value, tags));
      sent++;
    }

    const underlying = this.underlying;
    for (const h of node.histograms.values()) {
      const tags = this.tagsWithTimestamp(h.tags, latchStart);
      const latched = h.latch(this.baseValue);

      if (isLatchableSender(underlying)) {
        this.send(h.name, () => underlying.latchedHistogram(h.name, latched, tags));
      } else {
        this.sendBuckets(h.name, latched, tags);
      }
      sent++;
    }

    if (sent > 0) {
      const latchedAtTags = nodeTag !== '' ? [kvTag(NODE_TAG, nodeTag, this.tagFormat)] : [];
      const tags = this.tagsWithTimestamp(latchedAtTags, latchStart);
      this.send(LATCHED_AT_METRIC, () =>
        this.underlying.gauge(LATCHED_AT_METRIC, Math.floor(latchStart / 1000), tags)
      );
    }
  }

  private sendBuckets(name: string, latched: LatchedHistogram, tags: Tag[]): void {
    const bounds = bucketBounds(latched.baseValue, latched.buckets.length);
    latched.buckets.forEach((c, i) => {
      const bucket = this.stat(name, formatBound(bounds[i]));
      this.send(bucket, () => this.underlying.count(bucket, c, tags));
    });

    const count = this.stat(name, 'count');
    this.send(count, () => this.underlying.count(count, latched.count, tags));
    const sum = this.stat(name, 'sum');
    this.send(sum, () => this.underlying.count(sum, latched.sum, tags));
    const min = this.stat(name, 'min');
    this.send(min, () => this.underlying.gauge(min, latched.min, tags));
    const max = this.stat(name, 'max');
    this.send(max, () => this.underlying.gauge(max, latched.max, tags));
  }

  /**
   * Invoke the underlying sender, logging rather than propagating failures
   */
  private send(metric: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      const error = new EmissionError(metric, toError(err));
      this.logger.error(error.message, error.toJSON());
    }
  }

  private stat(name: string, suffix: string): string {
    return `${name}${this.tagFormat.scopeDelimiter}${suffix}`;
  }

  private tagsWithTimestamp(tags: readonly Tag[], latchStart: number): Tag[] {
    return [...tags, kvTag(TIMESTAMP_TAG, String(latchStart), this.tagFormat)];
  }

  /**
   * Returns sorted tags with a valid timestamp tag removed. The node tag's
   * value is returned but the tag itself is kept. A timestamp tag whose
   * value is not a safe integer stays in the tag set.
   */
  private latchedTags(input: readonly Tag[]): LatchedTags {
    const tags = [...input].sort();

    let timestamp: number | undefined;
    const tsIdx = tags.findIndex((tag) => splitTag(tag, this.tagFormat)[0] === TIMESTAMP_TAG);
    if (tsIdx !== -1) {
      const value = splitTag(tags[tsIdx], this.tagFormat)[1];
      const parsed = Number(value);
      if (INTEGER_PATTERN.test(value) && Number.isSafeInteger(parsed)) {
        timestamp = parsed;
        tags.splice(tsIdx, 1);
      }
    }

    let node = '';
    const nodeTag = tags.find((tag) => splitTag(tag, this.tagFormat)[0] === NODE_TAG);
    if (nodeTag !== undefined) {
      node = splitTag(nodeTag, this.tagFormat)[1];
    }

    return { tags, node, timestamp };
  }
}
