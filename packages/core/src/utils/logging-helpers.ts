/**
 * Logging helpers for the retrieval pipeline
 *
 * Tracking pages are large HTML documents; these helpers keep them out of the logs
 * unless LoggingOptions ask for them.
 */

import type { EngineContext, LoggingOptions } from '../interfaces/engine-context.js';
import type { Logger } from '../interfaces/logger.js';

export type LogContext = Pick<EngineContext, 'loggingOptions' | 'operationName'>;

const DEFAULT_LOGGING_OPTIONS: Required<LoggingOptions> = {
  maxArrayItems: 10,
  maxDepth: 2,
  logRawResponse: 'summary',
  logMetadata: false,
  silentOperations: [],
};

/**
 * Check if logging should be suppressed for this operation
 */
export function isSilentOperation(
  ctx: LogContext,
  defaultSilentOps: string[] = []
): boolean {
  const operationName = ctx.operationName;
  if (!operationName) return false;

  const silentOps = [
    ...(ctx.loggingOptions?.silentOperations ?? defaultSilentOps),
    ...DEFAULT_LOGGING_OPTIONS.silentOperations,
  ];

  return silentOps.includes(operationName);
}

/**
 * Get merged logging options with defaults
 */
export function getLoggingOptions(ctx: LogContext): Required<LoggingOptions> {
  return {
    ...DEFAULT_LOGGING_OPTIONS,
    ...ctx.loggingOptions,
  };
}

/**
 * Truncate a value for logging, respecting maxDepth and maxArrayItems.
 * Strings longer than 500 characters are cut.
 */
export function truncateForLogging(
  value: unknown,
  options: Required<LoggingOptions>,
  currentDepth: number = 0
): unknown {
  if (typeof value === 'string') {
    return value.length > 500 ? `${value.slice(0, 500)}... [${value.length} chars]` : value;
  }

  if (currentDepth >= options.maxDepth) {
    if (Array.isArray(value)) return `[Array: ${value.length} items]`;
    if (value !== null && typeof value === 'object') return `[Object: ${Object.keys(value).length} keys]`;
    return value;
  }

  if (Array.isArray(value)) {
    if (options.maxArrayItems === 0) {
      return `[Array: ${value.length} items (truncated)]`;
    }
    const mapped = value
      .slice(0, options.maxArrayItems)
      .map((item) => truncateForLogging(item, options, currentDepth + 1));
    if (value.length > options.maxArrayItems) {
      return [...mapped, `... and ${value.length - options.maxArrayItems} more items`];
    }
    return mapped;
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (key === 'metadata' && !options.logMetadata) {
        result[key] = '[metadata omitted]';
        continue;
      }
      result[key] = truncateForLogging(entry, options, currentDepth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Summarize a raw payload without logging it
 */
export function summarizeRawResponse(raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null || raw === '') return { message: 'No raw response' };

  if (typeof raw === 'string') {
    const title = /<title[^>]*>([^<]{0,120})<\/title>/i.exec(raw)?.[1]?.trim();
    return {
      type: 'text',
      length: raw.length,
      ...(title ? { title } : {}),
      preview: raw.slice(0, 100).replace(/\s+/g, ' '),
    };
  }

  if (Array.isArray(raw)) {
    return { type: 'array', count: raw.length };
  }

  if (typeof raw === 'object') {
    const keys = Object.keys(raw);
    return {
      type: 'object',
      keyCount: keys.length,
      keys: keys.slice(0, 10),
    };
  }

  return {
    type: typeof raw,
    value: String(raw).slice(0, 100),
  };
}

/**
 * Log with size checks
 * A `raw` entry in data is summarized, truncated or dropped per LoggingOptions.
 */
export function safeLog(
  logger: Logger | undefined,
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string,
  data: Record<string, unknown>,
  ctx: LogContext,
  silentOperationNames: string[] = []
): void {
  if (!logger) return;

  if (isSilentOperation(ctx, silentOperationNames)) {
    return;
  }

  const options = getLoggingOptions(ctx);
  const processed: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (key === 'raw') {
      if (options.logRawResponse === false) continue;
      processed.raw = options.logRawResponse === 'summary'
        ? summarizeRawResponse(value)
        : truncateForLogging(value, options);
      continue;
    }
    processed[key] = value !== null && typeof value === 'object' && !key.startsWith('_')
      ? truncateForLogging(value, options)
      : value;
  }

  logger[level](message, processed);
}
