/**
 * Time source exports
 */

export { SystemTimeSource, systemTimeSource } from './source.js';
export type { TimeSource, Timer } from './source.js';
