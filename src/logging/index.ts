/**
 * Logging exports
 */

export { PinoLogger, createLogger, noopLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export type { Logger } from '../types/index.js';
