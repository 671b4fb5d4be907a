/**
 * Sender exports
 */

export { StatsdSender, createStatsdSender } from './statsd.js';
export type { StatsDClient, StatsdSenderOptions } from './statsd.js';
export { LoggingSender } from './logging-sender.js';
export { MultiSender } from './multi-sender.js';
