/**
 * Logging Module
 *
 * @module logging
 */

export { LogCollector, NOOP_LOGGER, errorMessage } from './collector.js';
export type { Logger, LogLevel, LogEntry } from './collector.js';
