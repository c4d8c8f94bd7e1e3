import type { CarrierTag } from './tracking-number.js';
import type { StrategyAttempt, StrategyKind, RetrievalErrorKind } from './attempt.js';

/**
 * Controlled status vocabulary
 *
 * Free-text carrier statuses are mapped onto these by the result normalizer.
 */
export type TrackingStatus =
  | "Delivered"
  | "OutForDelivery"
  | "InTransit"
  | "PickedUp"
  | "Exception"
  | "Unknown";

export type ParserId = "structured-data" | "tabular" | "pattern" | "api-field";

/**
 * Which strategy and parser produced a result
 */
export interface Provenance {
  strategyId: string;
  strategyKind: StrategyKind;
  parserId: ParserId;
}

interface TrackingResultBase {
  trackingNumber: string;
  carrier: CarrierTag;
  /** Every attempt made for this request, in execution order */
  attempts: readonly StrategyAttempt[];
}

export interface TrackingSuccess extends TrackingResultBase {
  success: true;
  status: TrackingStatus;
  location: string;
  lastEventDescription: string;
  lastEventTimestamp: Date | null;
  provenance: Provenance;
  /** Parser base confidence, discounted for repeated fingerprint rotations */
  confidence: number;
}

export interface TrackingFailure extends TrackingResultBase {
  success: false;
  status: "Unknown";
  location: "";
  lastEventDescription: "";
  lastEventTimestamp: null;
  provenance: null;
  confidence: 0;
  /** Human-readable, never empty */
  reason: string;
  errorKind: RetrievalErrorKind;
  /** Strategy ids tried before giving up */
  attemptedStrategies: string[];
}

/**
 * Canonical result of one tracking request. Frozen once built.
 */
export type TrackingResult = TrackingSuccess | TrackingFailure;
