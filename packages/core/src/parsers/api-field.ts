import type { ExtractionParser, RawExtraction } from '../interfaces/parser.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import type { TrackingNumber } from '../types/tracking-number.js';
import { isAcceptableExtraction } from './code-guard.js';
import { findTrackingRecord, tryParseJson } from './json-fields.js';

const CONFIDENCE = 0.8;

function looksLikeJson(payload: RetrievedPayload): boolean {
  if (payload.contentType?.includes('json')) return true;
  return /^\s*[[{]/.test(payload.body);
}

/**
 * API-field parser
 * Recursive alias search over a decoded JSON body. The first object carrying both a
 * status and a location field wins.
 */
export const apiFieldParser: ExtractionParser = {
  id: 'api-field',
  confidence: CONFIDENCE,

  tryExtract(payload: RetrievedPayload, trackingNumber: TrackingNumber): RawExtraction | null {
    if (!looksLikeJson(payload)) return null;
    const decoded = tryParseJson(payload.body);
    if (decoded === undefined) return null;

    const record = findTrackingRecord(decoded, trackingNumber);
    if (!record) return null;

    const extraction: RawExtraction = {
      parserId: 'api-field',
      confidence: CONFIDENCE,
      statusText: record.status,
      location: record.location,
      description: record.description,
      timestamp: record.timestamp,
    };
    return isAcceptableExtraction(extraction) ? extraction : null;
  },
};
