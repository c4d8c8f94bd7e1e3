import type { TrackingNumber } from '../types/tracking-number.js';

// longest first so "PRONUMBER:" is not read as "PRO"
const PRO_PREFIXES = ['PRONUMBER:', 'PRONUMBER#', 'PRO:', 'PRO#', 'PRO '];

const SEPARATORS = /[\s\-./_]+/g;

export function normalizeTrackingNumber(raw: string): string {
  let value = raw.trim().toUpperCase();
  for (const prefix of PRO_PREFIXES) {
    if (value.startsWith(prefix)) {
      value = value.slice(prefix.length).trim();
      break;
    }
  }
  return value;
}

export function compactTrackingNumber(normalized: string): string {
  return normalized.replace(SEPARATORS, '');
}

export function createTrackingNumber(raw: string): TrackingNumber {
  const normalized = normalizeTrackingNumber(raw);
  return Object.freeze({
    raw,
    normalized,
    compact: compactTrackingNumber(normalized),
  });
}

/**
 * 5 to 30 letters and digits once separators are gone
 */
export function isValidTrackingNumber(trackingNumber: TrackingNumber): boolean {
  return /^[A-Z0-9]{5,30}$/.test(trackingNumber.compact);
}
