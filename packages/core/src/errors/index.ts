import type { RetrievalErrorKind } from "../types/attempt.js";

/**
 * RetrievalError
 * Structured error raised inside the strategy ladder.
 * The ladder catches every RetrievalError, records it on the attempt and moves on;
 * callers only ever see a failed TrackingResult.
 */
export class RetrievalError extends Error {
  /**
   * What went wrong
   *
   * - "NetworkError": connection, DNS or TLS failure
   * - "HttpStatusError": non-2xx without a body worth classifying
   * - "Timeout": strategy timeout or request deadline
   * - "AntiBotBlocked" / "ScriptMisclassification": classifier verdicts
   * - "ParseFailure": usable content, no parser matched
   * - "AllStrategiesExhausted": terminal ladder state
   */
  readonly kind: RetrievalErrorKind;

  /**
   * Strategy step that raised the error
   */
  readonly strategyId?: string;

  /**
   * HTTP status, when a response was received
   */
  readonly status?: number;

  /**
   * Raw error or response for debugging
   */
  readonly raw?: unknown;

  constructor(
    message: string,
    kind: RetrievalErrorKind,
    opts?: {
      strategyId?: string;
      status?: number;
      raw?: unknown;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, RetrievalError.prototype);
    this.name = "RetrievalError";
    this.kind = kind;
    this.strategyId = opts?.strategyId;
    this.status = opts?.status;
    this.raw = opts?.raw;
  }
}

/**
 * NotImplementedError
 * Thrown when a strategy kind needs a capability that was not configured
 */
export class NotImplementedError extends Error {
  constructor(capability: string, strategyId: string) {
    super(
      `Capability '${capability}' is not configured for strategy '${strategyId}'`
    );
    Object.setPrototypeOf(this, NotImplementedError.prototype);
    this.name = "NotImplementedError";
  }
}

/**
 * ValidationError
 * Thrown when input or configuration validation fails
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = "ValidationError";
  }
}

export { translateHttpError } from "./translate.js";
