// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export { RetrievalError, NotImplementedError, ValidationError, translateHttpError } from './errors/index.js';
export { HttpError, isTimeoutError, isCancelError } from './http/errors.js';

// Configuration
export * from './config/index.js';

// Pipeline
export * from './identify/index.js';
export * from './session/index.js';
export * from './classify/index.js';
export * from './parsers/index.js';
export * from './strategies/index.js';
export * from './ladder/index.js';
export * from './normalize/index.js';
export * from './batch/index.js';
export * from './render/index.js';

// Entry point
export { createTracker } from './tracker.js';
export type { Tracker, TrackerOptions, TrackOptions, TrackerStats } from './tracker.js';
export {
  TrackRequestSchema,
  BatchRequestSchema,
  safeValidateTrackRequest,
  safeValidateBatchRequest,
} from './validation.js';
export type { TrackRequest, BatchRequest } from './validation.js';

// Http clients (convenience exports)
export { createAxiosHttpClient } from './http/axios-client.js';
export type { AxiosHttpClientOptions } from './http/axios-client.js';

// Utilities
export { serializeForLog, truncateString, sanitizeHeadersForLog, errorToLog } from './utils/index.js';
export {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
  safeLog,
} from './utils/logging-helpers.js';
export type { LogContext } from './utils/logging-helpers.js';
