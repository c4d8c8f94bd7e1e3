import type { ParserId } from './tracking.js';

export type Verdict = "USABLE_CONTENT" | "ANTI_BOT_BLOCK" | "SCRIPT_NOT_DATA" | "EMPTY";

export type StrategyKind =
  | "direct-fetch"
  | "form-submit"
  | "json-api"
  | "challenge-bypass"
  | "mirror-lookup"
  | "render";

export type AttemptOutcome =
  | "Success"
  | "NoData"
  | "Blocked"
  | "NetworkError"
  | "Timeout"
  | "Skipped";

export type RetrievalErrorKind =
  | "NetworkError"
  | "HttpStatusError"
  | "Timeout"
  | "AntiBotBlocked"
  | "ScriptMisclassification"
  | "ParseFailure"
  | "AllStrategiesExhausted"
  | "Cancelled"
  | "InvalidTrackingNumber"
  | "NotConfigured";

/**
 * Record of one strategy execution, kept for the lifetime of the request only
 */
export interface StrategyAttempt {
  strategyId: string;
  kind: StrategyKind;
  startedAt: Date;
  finishedAt: Date;
  /** Bytes of payload received (0 when the call failed) */
  payloadSize: number;
  httpStatus?: number;
  verdict?: Verdict;
  parserId?: ParserId;
  outcome: AttemptOutcome;
  errorKind?: RetrievalErrorKind;
  /** Short diagnostic, e.g. the classifier reason or error message */
  detail?: string;
  fingerprintId: string;
  /** Proxy the attempt went through, when one was bound */
  proxyId?: string;
}
