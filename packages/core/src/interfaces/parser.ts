import type { TrackingNumber } from '../types/tracking-number.js';
import type { ParserId } from '../types/tracking.js';
import type { RetrievedPayload } from './strategy.js';

/**
 * Raw fields pulled out of a payload, before vocabulary mapping
 */
export interface RawExtraction {
  parserId: ParserId;
  confidence: number;
  statusText: string;
  location: string;
  description: string;
  timestamp: Date | null;
}

export interface ExtractionParser {
  readonly id: ParserId;
  readonly confidence: number;
  tryExtract(payload: RetrievedPayload, trackingNumber: TrackingNumber): RawExtraction | null;
}
