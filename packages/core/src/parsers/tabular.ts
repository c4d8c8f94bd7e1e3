import type { ExtractionParser, RawExtraction } from '../interfaces/parser.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import { loadDocument, selectAll, textOf, type DomElement } from '../utils/dom.js';
import { isAcceptableExtraction } from './code-guard.js';
import {
  DATE_TOKEN_GLOBAL,
  STATUS_PHRASE,
  findDate,
  findLocation,
  withoutDatesAndStatus,
} from './tokens.js';

const CONFIDENCE = 0.8;

interface RowCandidate {
  extraction: RawExtraction;
  sortKey: number;
}

function cellsOf(row: DomElement): string[] {
  const cells = selectAll(row, 'td, th').map(textOf).filter(Boolean);
  return cells.length > 0 ? cells : [textOf(row)];
}

function rowLocation(cells: string[], statusCell: number): string {
  const stripped = cells.map(withoutDatesAndStatus);
  for (const text of stripped) {
    const location = findLocation(text);
    if (location) return location;
  }
  // no "City, ST" anywhere: fall back to the first leftover cell that is not the status
  return stripped.find((text, i) => i !== statusCell && /[A-Za-z]{3}/.test(text)) ?? '';
}

function readRow(row: DomElement): RawExtraction | null {
  const cells = cellsOf(row);
  const rowText = cells.join(' ');
  const status = STATUS_PHRASE.exec(rowText);
  const date = findDate(rowText);
  if (!status || !date) return null;

  // the phrase may straddle cells ("In" | "Transit"); then the whole row describes it
  const statusCell = cells.findIndex((cell) => STATUS_PHRASE.test(cell));
  const location = rowLocation(cells, statusCell);
  const description = (statusCell >= 0 ? cells[statusCell] : rowText)
    .replace(DATE_TOKEN_GLOBAL, ' ')
    .replace(location, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s,;|-]+|[\s,;|-]+$/g, '');

  return {
    parserId: 'tabular',
    confidence: CONFIDENCE,
    statusText: status[1],
    location,
    description: description || status[1],
    timestamp: date.date,
  };
}

/**
 * Tabular parser
 * Scans table rows and list items for a status phrase plus a date. The most recent
 * qualifying row wins; equal or missing dates favour the later row.
 */
export const tabularParser: ExtractionParser = {
  id: 'tabular',
  confidence: CONFIDENCE,

  tryExtract(payload: RetrievedPayload): RawExtraction | null {
    if (!/<(tr|li)\b/i.test(payload.body)) return null;
    const doc = loadDocument(payload.body);

    let best: RowCandidate | null = null;
    for (const row of selectAll(doc, 'tr, li')) {
      const extraction = readRow(row);
      if (!extraction || !isAcceptableExtraction(extraction)) continue;
      const sortKey = extraction.timestamp?.getTime() ?? Number.NEGATIVE_INFINITY;
      if (!best || sortKey >= best.sortKey) best = { extraction, sortKey };
    }
    return best?.extraction ?? null;
  },
};
