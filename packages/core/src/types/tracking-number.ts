/**
 * TrackingNumber value type
 *
 * `raw` is exactly what the caller passed in. `normalized` is trimmed, upper-cased and
 * stripped of a leading PRO label. `compact` further drops separators and is the form
 * identification rules and endpoint templates see.
 */
export interface TrackingNumber {
  readonly raw: string;
  readonly normalized: string;
  readonly compact: string;
}

/**
 * Carrier identifier as configured (e.g. "estes", "rl_carriers").
 * "unknown" when no identification rule matched.
 */
export type CarrierTag = string;

export const UNKNOWN_CARRIER: CarrierTag = "unknown";

export interface CarrierIdentification {
  carrier: CarrierTag;
  /** 0 for unknown, 1 for an explicit carrier hint */
  confidence: number;
  trackingNumber: TrackingNumber;
}
