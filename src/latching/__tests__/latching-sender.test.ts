import { describe, it, expect, beforeEach } from 'vitest';
import { LatchingSender, LATCHED_AT_METRIC } from '../latching-sender.js';
import { ConfigurationError } from '../../errors/index.js';
import type { LatchedHistogram } from '../../types/index.js';
import {
  ManualTimeSource,
  RecordingLatchableSender,
  RecordingLogger,
  RecordingSender,
} from '../../testing/index.js';

const BASE = 1_700_000_000_000;

const measurements = [
  0.001, 0.0085, 0.0115, 0.02,
  0.002, 0.01, 0.01, 0.021,
  0.003, 0.01, 0.01, 0.022,
  0.004, 0.01, 0.01, 0.023,
  0.005, 0.01, 0.01, 0.024,
];

function window(values: number[], buckets: number[]): LatchedHistogram {
  return {
    baseValue: 0.001,
    buckets,
    count: values.length,
    sum: values.reduce((acc, v) => acc + v, 0),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}

const histograms: LatchedHistogram[] = [
  window(measurements.slice(0, 4), [1, 0, 0, 0, 2, 1, 0, 0, 0, 0]),
  window(measurements.slice(4, 8), [0, 1, 0, 0, 2, 1, 0, 0, 0, 0]),
  window(measurements.slice(8, 12), [0, 0, 1, 0, 2, 1, 0, 0, 0, 0]),
  window(measurements.slice(12, 16), [0, 0, 1, 0, 2, 1, 0, 0, 0, 0]),
  window(measurements.slice(16, 20), [0, 0, 0, 1, 2, 1, 0, 0, 0, 0]),
];

const BOUNDS = ['0.001', '0.002', '0.004', '0.008', '0.016', '0.032', '0.064', '0.128', '0.256', '0.512'];

function tsTag(ms: number): string {
  return `timestamp=${ms}`;
}

describe('LatchingSender', () => {
  let time: ManualTimeSource;
  let underlying: RecordingSender;
  let logger: RecordingLogger;

  beforeEach(() => {
    time = new ManualTimeSource(BASE + 100);
    underlying = new RecordingSender();
    logger = new RecordingLogger();
  });

  function latching(target = underlying): LatchingSender {
    return new LatchingSender(target, {
      window: 1000,
      baseValue: 0.001,
      buckets: 10,
      timeSource: time,
      logger,
    });
  }

  describe('construction', () => {
    it('should apply defaults', () => {
      const s = new LatchingSender(underlying);

      expect(s.window).toBe(60_000);
      expect(s.baseValue).toBe(0.001);
      expect(s.numBuckets).toBe(20);
    });

    it('should reject a non-positive window', () => {
      expect(() => new LatchingSender(underlying, { window: 0 })).toThrow(ConfigurationError);
      expect(() => new LatchingSender(underlying, { window: -5 })).toThrow('window must be greater than 0');
    });

    it('should reject a non-positive base value', () => {
      expect(() => new LatchingSender(underlying, { baseValue: 0 })).toThrow(
        'base-value must be greater than 0'
      );
    });

    it('should reject fewer than two buckets', () => {
      expect(() => new LatchingSender(underlying, { buckets: 1 })).toThrow(
        'buckets must be greater than 1'
      );
    });
  });

  describe('counters', () => {
    it.each([
      { source: 'timestamp tags', setTimestamp: true },
      { source: 'the time source', setTimestamp: false },
    ])('should latch counters per window using $source', async ({ setTimestamp }) => {
      const s = latching();

      for (let v = 1; v <= 10; v++) {
        s.count('c1', v, setTimestamp ? [tsTag(time.now())] : []);
        time.advance(500);
      }
      await s.close();

      const expected = [3, 7, 11, 15, 19].flatMap((value, n) => [
        `count c1=${value} [${tsTag(BASE + n * 1000)}]`,
        `gauge latched_at=${1_700_000_000 + n} [${tsTag(BASE + n * 1000)}]`,
      ]);
      expect(underlying.lines()).toEqual(expected);
      expect(underlying.closed).toBe(true);
    });
  });

  describe('gauges', () => {
    it('should emit the last gauge value of each window', async () => {
      const s = latching();

      for (let v = 1; v <= 10; v++) {
        s.gauge('g1', v, [tsTag(time.now())]);
        time.advance(500);
      }
      await s.close();

      expect(underlying.named('g1').map((m) => m.value)).toEqual([2, 4, 6, 8, 10]);
    });
  });

  describe('histograms', () => {
    it('should emit latched histograms to a latchable sender', async () => {
      const target = new RecordingLatchableSender();
      const s = latching(target);

      for (const v of measurements) {
        s.histogram('h1', v, [tsTag(time.now())]);
        time.advance(250);
      }
      await s.close();

      const latched = target.named('h1');
      expect(latched.map((m) => m.kind)).toEqual(Array(5).fill('latchedHistogram'));
      expect(latched.map((m) => m.histogram)).toEqual(histograms);
      expect(latched.map((m) => m.tags)).toEqual([0, 1, 2, 3, 4].map((n) => [tsTag(BASE + n * 1000)]));
      expect(target.named(LATCHED_AT_METRIC)).toHaveLength(5);
    });

    it('should emit per-bucket counts and aggregates to a plain sender', async () => {
      const s = latching();

      for (const v of measurements) {
        s.histogram('h1', v, [tsTag(time.now())]);
        time.advance(250);
      }
      await s.close();

      const expected = histograms.flatMap((h, n) => {
        const tags = `[${tsTag(BASE + n * 1000)}]`;
        return [
          ...h.buckets.map((count, i) => `count h1.${BOUNDS[i]}=${count} ${tags}`),
          `count h1.count=${h.count} ${tags}`,
          `count h1.sum=${h.sum} ${tags}`,
          `gauge h1.min=${h.min} ${tags}`,
          `gauge h1.max=${h.max} ${tags}`,
          `gauge latched_at=${1_700_000_000 + n} ${tags}`,
        ];
      });
      expect(underlying.lines()).toEqual(expected);
    });

    it('should render large and small bucket bounds in exponent form', async () => {
      const s = new LatchingSender(underlying, { window: 1000, baseValue: 1e6, buckets: 2, timeSource: time });
      const tiny = new LatchingSender(underlying, { window: 1000, baseValue: 1e-5, buckets: 2, timeSource: time });

      s.histogram('big', 1);
      tiny.histogram('small', 1);
      await s.close();
      await tiny.close();

      const buckets = underlying.sent
        .map((m) => m.name)
        .filter((name) => /\.\d/.test(name));
      expect(buckets).toEqual(['big.1e+06', 'big.2e+06', 'small.1e-05', 'small.2e-05']);
    });

    it('should render mid-range bucket bounds as plain decimals', async () => {
      const s = new LatchingSender(underlying, { window: 1000, baseValue: 131072, buckets: 4, timeSource: time });

      s.histogram('h', 1);
      await s.close();

      expect(underlying.named('h.131072')).toHaveLength(1);
      expect(underlying.named('h.524288')).toHaveLength(1);
      expect(underlying.named('h.1.048576e+06')).toHaveLength(1);
    });

    it('should latch timings as histograms in seconds', async () => {
      const target = new RecordingLatchableSender();
      const s = latching(target);

      for (const v of measurements) {
        s.timing('t1', v * 1000, [tsTag(time.now())]);
        time.advance(250);
      }
      await s.close();

      const latched = target.named('t1').map((m) => m.histogram);
      expect(latched).toHaveLength(5);
      latched.forEach((h, n) => {
        expect(h?.buckets).toEqual(histograms[n].buckets);
        expect(h?.count).toBe(4);
        expect(h?.sum).toBeCloseTo(histograms[n].sum, 12);
        expect(h?.min).toBeCloseTo(histograms[n].min, 12);
        expect(h?.max).toBeCloseTo(histograms[n].max, 12);
      });
    });
  });

  describe('multiple metrics', () => {
    it('should latch every stat of a window with its own tags', async () => {
      const s = latching();

      for (let n = 0; n < 10; n++) {
        const ts = tsTag(time.now());
        s.count('c1', n + 1, [ts]);
        s.count('c2', n + 3, [ts]);
        s.gauge('g', n, [ts, 'a=1']);
        s.gauge('g', n + 3, [ts, 'a=2']);
        time.advance(500);
      }
      await s.close();

      const expected = [0, 1, 2, 3, 4].flatMap((n) => {
        const ts = tsTag(BASE + n * 1000);
        return [
          `count c1=${4 * n + 3} [${ts}]`,
          `count c2=${4 * n + 7} [${ts}]`,
          `gauge g=${2 * n + 1} [a=1,${ts}]`,
          `gauge g=${2 * n + 4} [a=2,${ts}]`,
          `gauge latched_at=${1_700_000_000 + n} [${ts}]`,
        ];
      });
      expect(underlying.lines()).toEqual(expected);
    });

    it('should aggregate tag sets independently of order', async () => {
      const s = latching();

      s.count('c', 1, ['b=2', 'a=1']);
      s.count('c', 2, ['a=1', 'b=2']);
      await s.close();

      expect(underlying.named('c').map((m) => [m.value, m.tags])).toEqual([
        [3, ['a=1', 'b=2', tsTag(BASE)]],
      ]);
    });
  });

  describe('timestamp tags', () => {
    it('should take the sample time from a valid timestamp tag', async () => {
      const s = latching();

      s.count('c', 1, [tsTag(BASE + 5_500)]);
      s.count('c', 1, [tsTag(BASE + 7_200)]);
      await s.close();

      expect(underlying.lines()).toEqual([
        `count c=1 [${tsTag(BASE + 5_000)}]`,
        `gauge latched_at=1700000005 [${tsTag(BASE + 5_000)}]`,
        `count c=1 [${tsTag(BASE + 7_000)}]`,
        `gauge latched_at=1700000007 [${tsTag(BASE + 7_000)}]`,
      ]);
    });

    it('should keep a non-integer timestamp tag and use the time source', async () => {
      const s = latching();

      s.count('c', 1, ['XYZ=123', 'timestamp=nope', 'ABC=456']);
      await s.close();

      expect(underlying.named('c')[0].tags).toEqual([
        'ABC=456',
        'XYZ=123',
        'timestamp=nope',
        tsTag(BASE),
      ]);
    });

    it('should keep a timestamp tag beyond the safe integer range', async () => {
      const s = latching();

      s.count('c', 1, ['timestamp=99999999999999999999']);
      await s.close();

      expect(underlying.lines()).toEqual([
        `count c=1 [timestamp=99999999999999999999,${tsTag(BASE)}]`,
        `gauge latched_at=1700000000 [${tsTag(BASE)}]`,
      ]);
    });

    it('should fold a sample from an earlier window into the open window', async () => {
      const s = latching();

      s.count('c', 1, [tsTag(BASE + 5_000)]);
      s.count('c', 2, [tsTag(BASE + 1_000)]);
      await s.close();

      expect(underlying.lines()).toEqual([
        `count c=3 [${tsTag(BASE + 5_000)}]`,
        `gauge latched_at=1700000005 [${tsTag(BASE + 5_000)}]`,
      ]);
    });
  });

  describe('idle windows', () => {
    it('should emit nothing for windows without samples', async () => {
      const s = latching();

      s.count('c', 1);
      time.advance(10_000);
      s.count('c', 4);
      await s.close();

      expect(underlying.lines()).toEqual([
        `count c=1 [${tsTag(BASE)}]`,
        `gauge latched_at=1700000000 [${tsTag(BASE)}]`,
        `count c=4 [${tsTag(BASE + 10_000)}]`,
        `gauge latched_at=1700000010 [${tsTag(BASE + 10_000)}]`,
      ]);
    });

    it('should not flush a window until a later sample or close', () => {
      const s = latching();

      s.count('c', 1);
      time.advance(5_000);

      expect(underlying.sent).toHaveLength(0);
      expect(s.snapshot()).toEqual([
        { node: '', latchStart: BASE, counters: 1, gauges: 0, histograms: 0 },
      ]);
    });
  });

  describe('node partitions', () => {
    it('should latch each node in its own window', async () => {
      const s = latching();

      s.count('c', 1, ['node=n1']);
      time.advance(1_000);
      s.count('c', 2, ['node=n2']);
      s.count('c', 3, ['node=n1']);
      await s.close();

      expect(underlying.lines()).toEqual([
        `count c=1 [node=n1,${tsTag(BASE)}]`,
        `gauge latched_at=1700000000 [node=n1,${tsTag(BASE)}]`,
        `count c=3 [node=n1,${tsTag(BASE + 1_000)}]`,
        `gauge latched_at=1700000001 [node=n1,${tsTag(BASE + 1_000)}]`,
        `count c=2 [node=n2,${tsTag(BASE + 1_000)}]`,
        `gauge latched_at=1700000001 [node=n2,${tsTag(BASE + 1_000)}]`,
      ]);
    });

    it('should report a snapshot per node', () => {
      const s = latching();

      s.count('c', 1, ['node=n1']);
      s.histogram('h', 0.5, ['node=n2']);
      s.gauge('g', 1, ['node=n2']);

      expect(s.snapshot()).toEqual([
        { node: 'n1', latchStart: BASE, counters: 1, gauges: 0, histograms: 0 },
        { node: 'n2', latchStart: BASE, counters: 0, gauges: 1, histograms: 1 },
      ]);
    });
  });

  describe('failures', () => {
    it('should log emission failures and keep flushing', async () => {
      const s = latching();
      underlying.failOn('c1');

      s.count('c1', 1);
      s.count('c2', 2);
      await s.close();

      expect(underlying.lines()).toEqual([
        `count c2=2 [${tsTag(BASE)}]`,
        `gauge latched_at=1700000000 [${tsTag(BASE)}]`,
      ]);
      expect(logger.messages('error')).toEqual(["Failed to emit metric 'c1'"]);
    });

    it('should keep emitting the rest of a histogram when one bucket fails', async () => {
      const s = latching();
      underlying.failOn('h.0.001');

      s.histogram('h', 0.003);
      await s.close();

      const tags = `[${tsTag(BASE)}]`;
      expect(underlying.lines()).toEqual([
        ...BOUNDS.slice(1).map((bound) => `count h.${bound}=${bound === '0.004' ? 1 : 0} ${tags}`),
        `count h.count=1 ${tags}`,
        `count h.sum=0.003 ${tags}`,
        `gauge h.min=0.003 ${tags}`,
        `gauge h.max=0.003 ${tags}`,
        `gauge latched_at=1700000000 ${tags}`,
      ]);
      expect(logger.messages('error')).toEqual(["Failed to emit metric 'h.0.001'"]);
    });

    it('should propagate the underlying close failure', async () => {
      const s = latching();
      underlying.failClose(new Error('socket gone'));
      s.count('c', 1);

      await expect(s.close()).rejects.toThrow('socket gone');
      expect(underlying.named('c')).toHaveLength(1);
    });
  });

  describe('close', () => {
    it('should close the underlying sender without emitting when empty', async () => {
      const s = latching();
      await s.close();

      expect(underlying.sent).toHaveLength(0);
      expect(underlying.closed).toBe(true);
    });

    it('should drop stats submitted after close', async () => {
      const s = latching();
      await s.close();

      s.count('late', 1);
      s.timing('late', 10);

      expect(underlying.sent).toHaveLength(0);
      expect(s.snapshot()).toEqual([]);
      expect(logger.messages('warn')).toEqual([
        'Dropping stat submitted after close',
        'Dropping stat submitted after close',
      ]);
    });

    it('should be idempotent', async () => {
      const s = latching();
      s.count('c', 1);

      await s.close();
      await s.close();

      expect(underlying.named('c')).toHaveLength(1);
    });
  });
});
