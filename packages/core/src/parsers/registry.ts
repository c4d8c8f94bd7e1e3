import type { ExtractionParser, RawExtraction } from '../interfaces/parser.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import type { Logger } from '../interfaces/logger.js';
import type { TrackingNumber } from '../types/tracking-number.js';
import { errorToLog } from '../utils/logging.js';
import { apiFieldParser } from './api-field.js';
import { isAcceptableExtraction } from './code-guard.js';
import { patternParser } from './pattern.js';
import { structuredDataParser } from './structured-data.js';
import { tabularParser } from './tabular.js';

/** Most specific first */
export const DEFAULT_PARSERS: readonly ExtractionParser[] = [
  structuredDataParser,
  tabularParser,
  patternParser,
  apiFieldParser,
];

/**
 * Run parsers in order; the first acceptable extraction wins.
 * A parser that throws is reported and skipped, the rest still run.
 */
export function extract(
  payload: RetrievedPayload,
  trackingNumber: TrackingNumber,
  parsers: readonly ExtractionParser[] = DEFAULT_PARSERS,
  logger?: Logger
): RawExtraction | null {
  for (const parser of parsers) {
    let extraction: RawExtraction | null;
    try {
      extraction = parser.tryExtract(payload, trackingNumber);
    } catch (error) {
      logger?.warn('parser failed', {
        parserId: parser.id,
        trackingNumber: trackingNumber.normalized,
        url: payload.url,
        error: errorToLog(error),
      });
      continue;
    }
    if (extraction && isAcceptableExtraction(extraction)) return extraction;
  }
  return null;
}
