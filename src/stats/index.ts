/**
 * Stats facade exports
 */

export type { Stats } from './interface.js';
export { SenderStats } from './sender-stats.js';
export type { SenderStatsOptions } from './sender-stats.js';
