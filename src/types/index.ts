/**
 * Type definitions for the latching stats package.
 */

export type { Tag, Tags, TagValue } from './common.js';

export { isLatchableSender } from './sender.js';
export type { Sender, LatchableSender, LatchedHistogram } from './sender.js';

export type { Stat, StatsPayload, ForwardResult } from './payload.js';

export type { Logger } from './logger.js';
