/**
 * Batching module exports
 */

export type { StatsClient, StatsForwarder } from './interface.js';

export { BatchingStatsClient } from './batching-client.js';
export type { BatchingStatsClientOptions } from './batching-client.js';

export { PayloadBatcher } from './payload-batcher.js';
export type { PayloadBatcherOptions, BatcherState } from './payload-batcher.js';

export { ForwardingStatsClient } from './forwarding-client.js';

export { ClientStats } from './client-stats.js';
