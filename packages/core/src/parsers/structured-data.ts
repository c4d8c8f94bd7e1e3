import type { ExtractionParser, RawExtraction } from '../interfaces/parser.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import type { TrackingNumber } from '../types/tracking-number.js';
import { loadDocument, selectAll } from '../utils/dom.js';
import { isAcceptableExtraction } from './code-guard.js';
import {
  belongsTo,
  field,
  findTrackingRecord,
  isRecord,
  locationText,
  statusText,
  timestampValue,
  tryParseJson,
  type JsonRecord,
} from './json-fields.js';

const CONFIDENCE = 0.95;

/** schema.org OrderStatus enumeration members */
const ORDER_STATUS: Record<string, string> = {
  OrderDelivered: 'Delivered',
  OrderInTransit: 'In Transit',
  OrderPickupAvailable: 'In Transit',
  OrderProcessing: 'Picked Up',
  OrderProblem: 'Exception',
  OrderReturned: 'Exception',
  OrderCancelled: 'Exception',
};

const WINDOW_ASSIGNMENT = /\bwindow\.[A-Za-z_$][\w$]*\s*=\s*(?=\{)/g;

/**
 * The object literal starting at `start`, found by brace matching outside strings
 */
export function objectLiteralAt(source: string, start: number): string | null {
  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '{') depth++;
    else if (ch === '}' && --depth === 0) return source.slice(start, i + 1);
  }
  return null;
}

function typesOf(node: JsonRecord): string[] {
  const type = node['@type'];
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === 'string');
  return [];
}

function flattenJsonLd(value: unknown, out: JsonRecord[] = []): JsonRecord[] {
  if (Array.isArray(value)) {
    for (const item of value) flattenJsonLd(item, out);
  } else if (isRecord(value)) {
    out.push(value);
    if (value['@graph'] !== undefined) flattenJsonLd(value['@graph'], out);
  }
  return out;
}

function schemaStatus(value: unknown): string {
  const text = statusText(value);
  const member = /schema\.org\/(Order\w+)$/.exec(text)?.[1] ?? text;
  return ORDER_STATUS[member] ?? text;
}

function fromParcelDelivery(node: JsonRecord, trackingNumber: TrackingNumber): RawExtraction | null {
  if (!belongsTo(node, trackingNumber)) return null;

  const event = field(node, ['deliveryStatus']);
  const status = schemaStatus(isRecord(event) ? field(event, ['name', 'description', 'eventStatus']) ?? event : event);
  if (!status) return null;

  const eventLocation = isRecord(event) ? field(event, ['location', 'atLocation']) : undefined;
  const location = locationText(eventLocation ?? field(node, ['deliveryAddress']));
  const description = isRecord(event) ? statusText(field(event, ['description'])) : '';
  const timestamp = timestampValue(
    (isRecord(event) ? field(event, ['startDate', 'availableFrom', 'endDate']) : undefined) ??
      field(node, ['dateModified'])
  );

  return {
    parserId: 'structured-data',
    confidence: CONFIDENCE,
    statusText: status,
    location,
    description: description || status,
    timestamp,
  };
}

function fromEmbeddedState(value: unknown, trackingNumber: TrackingNumber): RawExtraction | null {
  const record = findTrackingRecord(value, trackingNumber);
  if (!record) return null;
  return {
    parserId: 'structured-data',
    confidence: CONFIDENCE,
    statusText: record.status,
    location: record.location,
    description: record.description,
    timestamp: record.timestamp,
  };
}

/**
 * Structured-data parser
 * Reads schema.org ParcelDelivery markup from JSON-LD, then embedded application
 * state: `application/json` script blocks and `window.X = {...}` assignments.
 */
export const structuredDataParser: ExtractionParser = {
  id: 'structured-data',
  confidence: CONFIDENCE,

  tryExtract(payload: RetrievedPayload, trackingNumber: TrackingNumber): RawExtraction | null {
    if (!/<script/i.test(payload.body)) return null;
    const doc = loadDocument(payload.body);

    for (const script of selectAll(doc, 'script[type="application/ld+json"]')) {
      for (const node of flattenJsonLd(tryParseJson(script.textContent ?? ''))) {
        if (!typesOf(node).includes('ParcelDelivery')) continue;
        const extraction = fromParcelDelivery(node, trackingNumber);
        if (extraction && isAcceptableExtraction(extraction)) return extraction;
      }
    }

    for (const script of selectAll(doc, 'script[type="application/json"]')) {
      const extraction = fromEmbeddedState(tryParseJson(script.textContent ?? ''), trackingNumber);
      if (extraction && isAcceptableExtraction(extraction)) return extraction;
    }

    for (const script of selectAll(doc, 'script:not([type]), script[type="text/javascript"]')) {
      const source = script.textContent ?? '';
      for (const match of source.matchAll(WINDOW_ASSIGNMENT)) {
        const literal = objectLiteralAt(source, (match.index ?? 0) + match[0].length);
        if (!literal) continue;
        const extraction = fromEmbeddedState(tryParseJson(literal), trackingNumber);
        if (extraction && isAcceptableExtraction(extraction)) return extraction;
      }
    }

    return null;
  },
};
