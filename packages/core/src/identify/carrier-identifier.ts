import type { IdentificationRule } from '../types/carrier.js';
import { UNKNOWN_CARRIER, type CarrierIdentification, type CarrierTag, type TrackingNumber } from '../types/tracking-number.js';
import { createTrackingNumber } from './tracking-number.js';

function toTrackingNumber(input: string | TrackingNumber): TrackingNumber {
  return typeof input === 'string' ? createTrackingNumber(input) : input;
}

/**
 * Map a tracking number to a carrier.
 * Rules are tried in order; the first whose pattern matches the compact form wins.
 * No match gives "unknown" with confidence 0.
 */
export function identify(
  input: string | TrackingNumber,
  rules: readonly IdentificationRule[]
): CarrierIdentification {
  const trackingNumber = toTrackingNumber(input);
  for (const rule of rules) {
    if (rule.pattern.test(trackingNumber.compact)) {
      return { carrier: rule.carrier, confidence: rule.confidence, trackingNumber };
    }
  }
  return { carrier: UNKNOWN_CARRIER, confidence: 0, trackingNumber };
}

/**
 * Every carrier with at least one matching rule, best rule first
 */
export function candidateCarriers(
  input: string | TrackingNumber,
  rules: readonly IdentificationRule[]
): Array<{ carrier: CarrierTag; confidence: number }> {
  const trackingNumber = toTrackingNumber(input);
  const seen = new Set<CarrierTag>();
  const out: Array<{ carrier: CarrierTag; confidence: number }> = [];
  for (const rule of rules) {
    if (seen.has(rule.carrier) || !rule.pattern.test(trackingNumber.compact)) continue;
    seen.add(rule.carrier);
    out.push({ carrier: rule.carrier, confidence: rule.confidence });
  }
  return out;
}

export interface CarrierIdentifier {
  identify(input: string | TrackingNumber, carrierHint?: string): CarrierIdentification;
  candidates(input: string | TrackingNumber): Array<{ carrier: CarrierTag; confidence: number }>;
}

/**
 * Identifier bound to compiled rules. A hint naming a known carrier wins with confidence 1;
 * unknown hints are ignored.
 */
export function createCarrierIdentifier(
  rules: readonly IdentificationRule[],
  knownCarriers: ReadonlySet<CarrierTag>
): CarrierIdentifier {
  return {
    identify(input, carrierHint) {
      const hint = carrierHint?.trim().toLowerCase();
      if (hint && knownCarriers.has(hint)) {
        return { carrier: hint, confidence: 1, trackingNumber: toTrackingNumber(input) };
      }
      return identify(input, rules);
    },
    candidates(input) {
      return candidateCarriers(input, rules);
    },
  };
}
