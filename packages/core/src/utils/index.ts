/**
 * Shared utilities
 */

export { serializeForLog, truncateString, sanitizeHeadersForLog, errorToLog } from './logging.js';
export {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
  safeLog,
} from './logging-helpers.js';
export type { LogContext } from './logging-helpers.js';
export { decodeEntities, collapseWhitespace, stripTags, cleanValue, htmlToText } from './text.js';
export { jitter, sleep, linkSignals, raceAbort } from './async.js';
export type { LinkedSignal } from './async.js';
export { Semaphore, KeyedMutex, IntervalGate } from './concurrency.js';
