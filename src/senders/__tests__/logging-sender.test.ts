import { describe, it, expect } from 'vitest';
import { LoggingSender } from '../logging-sender.js';
import { isLatchableSender } from '../../types/index.js';
import { RecordingLogger } from '../../testing/index.js';

describe('LoggingSender', () => {
  it('should log each emission at debug level', () => {
    const logger = new RecordingLogger();
    const sender = new LoggingSender(logger);

    sender.count('c', 2, ['a=1']);
    sender.timing('t', 15);

    expect(logger.logs).toEqual([
      { level: 'debug', message: 'count c: 2', context: { name: 'c', value: 2, tags: ['a=1'] } },
      { level: 'debug', message: 'timing t: 15', context: { name: 't', value: 15, tags: [] } },
    ]);
  });

  it('should accept latched histograms', () => {
    const logger = new RecordingLogger();
    const sender = new LoggingSender(logger);
    const histogram = { baseValue: 1, buckets: [1, 0], count: 1, sum: 1, min: 1, max: 1 };

    expect(isLatchableSender(sender)).toBe(true);
    sender.latchedHistogram('h', histogram);

    expect(logger.messages('debug')).toEqual(['latched histogram h']);
    expect(logger.logs[0].context.histogram).toEqual(histogram);
  });
});
