import type { HttpClient } from './http-client.js';
import type { Logger } from './logger.js';

/**
 * Logging options for controlling verbosity of retrieval operations
 */
export interface LoggingOptions {
  /**
   * Maximum number of items to log in array values
   * Set to 0 to skip logging the array entirely
   */
  maxArrayItems?: number;

  /**
   * Maximum depth for nested object logging
   * Set to 0 to log only the type/count
   */
  maxDepth?: number;

  /**
   * Whether to log raw payloads
   * false = skip logging raw payloads entirely
   * true = log the payload (truncated)
   * "summary" = log only a summary (type, size, sample)
   * Default: "summary"
   */
  logRawResponse?: boolean | "summary";

  /**
   * Whether to include nested metadata in logs
   * Default: false
   */
  logMetadata?: boolean;

  /**
   * Operations to suppress logging for
   * Examples: ["trackBatch", "strategy:mirror-lookup"]
   */
  silentOperations?: string[];
}

/**
 * EngineContext
 * Injected dependencies shared by the ladder, strategies and orchestrator
 */
export interface EngineContext {
  /** HTTP client used by every network strategy */
  http: HttpClient;

  /** Optional logger instance */
  logger?: Logger;

  /** Optional telemetry client */
  telemetry?: TelemetryClient;

  /**
   * Optional logging configuration
   * Default: { logRawResponse: "summary", maxArrayItems: 10, maxDepth: 2 }
   */
  loggingOptions?: LoggingOptions;

  /**
   * Operation name for context-aware logging, matched against silentOperations
   * Examples: "track", "trackBatch"
   */
  operationName?: string;
}

/**
 * TelemetryClient interface
 * Pluggable metrics sink
 */
export interface TelemetryClient {
  recordHistogram(
    name: string,
    value: number,
    tags?: Record<string, string>
  ): void;

  incrementCounter(
    name: string,
    value?: number,
    tags?: Record<string, string>
  ): void;

  recordGauge(
    name: string,
    value: number,
    tags?: Record<string, string>
  ): void;
}
