import type { ExtractionParser, RawExtraction } from '../interfaces/parser.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import { htmlToText } from '../utils/text.js';
import { isAcceptableExtraction } from './code-guard.js';
import { STATUS_PHRASE, findDate, findLocation, withoutDatesAndStatus } from './tokens.js';

const CONFIDENCE = 0.5;

const STATUS_LABEL = /^(?:current |shipment |delivery )?status\s*[:-]\s*(.{3,120})$/i;
const LOCATION_LABEL = /^(?:current |last |last known )?location\s*[:-]\s*(.{2,120})$/i;

function payloadText(payload: RetrievedPayload): string {
  return /<[a-z!]/i.test(payload.body) ? htmlToText(payload.body) : payload.body;
}

function labelled(lines: string[]): RawExtraction | null {
  let status: string | null = null;
  let location = '';
  let timestamp: Date | null = null;

  for (const line of lines) {
    const statusMatch = STATUS_LABEL.exec(line);
    if (statusMatch && !status && STATUS_PHRASE.test(statusMatch[1])) {
      status = statusMatch[1].trim();
      timestamp = findDate(status)?.date ?? timestamp;
      continue;
    }
    const locationMatch = LOCATION_LABEL.exec(line);
    if (locationMatch && !location) {
      location = findLocation(locationMatch[1]) ?? locationMatch[1].trim();
    }
    if (status && !timestamp) timestamp = findDate(line)?.date ?? null;
  }

  if (!status || (!location && !timestamp)) return null;
  const phrase = STATUS_PHRASE.exec(status)?.[1] ?? status;
  return {
    parserId: 'pattern',
    confidence: CONFIDENCE,
    statusText: phrase,
    location,
    description: status,
    timestamp,
  };
}

/**
 * Status phrase with a date and a "City, ST" on the same line or its neighbours,
 * in either order
 */
function proximity(lines: string[]): RawExtraction | null {
  let best: { extraction: RawExtraction; sortKey: number } | null = null;

  for (const [i, line] of lines.entries()) {
    const status = STATUS_PHRASE.exec(line);
    if (!status) continue;
    const window = [lines[i - 1] ?? '', line, lines[i + 1] ?? ''].join(' \n ');
    const date = findDate(line) ?? findDate(window);
    const location = findLocation(withoutDatesAndStatus(line)) ?? findLocation(withoutDatesAndStatus(window));
    if (!date || !location) continue;

    const extraction: RawExtraction = {
      parserId: 'pattern',
      confidence: CONFIDENCE,
      statusText: status[1],
      location,
      description: line.length <= 160 ? line : status[1],
      timestamp: date.date,
    };
    if (!isAcceptableExtraction(extraction)) continue;
    const sortKey = date.date?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (!best || sortKey >= best.sortKey) best = { extraction, sortKey };
  }

  return best?.extraction ?? null;
}

/**
 * Pattern parser
 * Broad-net fallback over visible page text: labelled fields first, then proximity.
 */
export const patternParser: ExtractionParser = {
  id: 'pattern',
  confidence: CONFIDENCE,

  tryExtract(payload: RetrievedPayload): RawExtraction | null {
    // JSON bodies belong to the api-field parser
    if (/^\s*[[{]/.test(payload.body)) return null;
    const lines = payloadText(payload).split('\n').map((line) => line.trim()).filter(Boolean);
    const fromLabels = labelled(lines);
    if (fromLabels && isAcceptableExtraction(fromLabels)) return fromLabels;
    return proximity(lines);
  },
};
