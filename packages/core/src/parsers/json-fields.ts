import type { TrackingNumber } from '../types/tracking-number.js';
import { compactTrackingNumber } from '../identify/tracking-number.js';
import { cleanValue } from '../utils/text.js';
import { parseDateToken } from './tokens.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export const STATUS_KEYS = [
  'status', 'trackingStatus', 'shipmentStatus', 'deliveryStatus', 'currentStatus',
  'statusDescription', 'statusText',
];
export const LOCATION_KEYS = [
  'location', 'currentLocation', 'lastLocation', 'lastKnownLocation', 'destination', 'city',
];
export const TIMESTAMP_KEYS = [
  'timestamp', 'eventTimestamp', 'dateTime', 'eventDate', 'statusDate', 'date',
  'lastUpdated', 'updatedAt', 'eventTime',
];
export const DESCRIPTION_KEYS = [
  'description', 'eventDescription', 'statusDetail', 'details', 'message', 'event',
];
const TRACKING_NUMBER_KEYS = ['trackingNumber', 'proNumber', 'pro', 'trackingId', 'shipmentNumber'];

/**
 * Case-insensitive field lookup; aliases are tried in order
 */
export function field(record: JsonRecord, aliases: readonly string[]): unknown {
  const lowered = new Map(Object.keys(record).map((key) => [key.toLowerCase(), key]));
  for (const alias of aliases) {
    const key = lowered.get(alias.toLowerCase());
    if (key !== undefined && record[key] !== null && record[key] !== undefined && record[key] !== '') {
      return record[key];
    }
  }
  return undefined;
}

function scalarText(value: unknown): string {
  if (typeof value === 'string') return cleanValue(value);
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Status given as text or as an object with a name, description or code
 */
export function statusText(value: unknown): string {
  if (isRecord(value)) {
    return statusText(field(value, ['name', 'description', 'status', 'text', 'code']));
  }
  // numeric "status" fields are usually HTTP codes in an envelope
  return typeof value === 'string' ? cleanValue(value) : '';
}

/**
 * Location given as text or as an address object
 */
export function locationText(value: unknown): string {
  if (!isRecord(value)) return scalarText(value);

  const address = field(value, ['address']);
  if (isRecord(address)) return locationText(address);

  const city = scalarText(field(value, ['city', 'addressLocality', 'town']));
  const region = scalarText(field(value, ['state', 'stateCode', 'province', 'addressRegion', 'region']));
  if (city && region) return `${city}, ${region}`;
  if (city) return city;
  return scalarText(field(value, ['name', 'description']));
}

export function timestampValue(value: unknown): Date | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    // epoch seconds or milliseconds
    return new Date(value < 1e12 ? value * 1000 : value);
  }
  if (typeof value !== 'string' || !value.trim()) return null;
  return parseDateToken(value) ?? parseLooseDate(value);
}

function parseLooseDate(value: string): Date | null {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * False when the record names a different shipment (mirror pages list several)
 */
export function belongsTo(record: JsonRecord, trackingNumber: TrackingNumber): boolean {
  const named = scalarText(field(record, TRACKING_NUMBER_KEYS));
  return !named || compactTrackingNumber(named.toUpperCase()) === trackingNumber.compact;
}

export interface FieldRecord {
  status: string;
  location: string;
  description: string;
  timestamp: Date | null;
}

/**
 * Depth-first search for the first object that carries both a status and a location
 */
export function findTrackingRecord(
  value: unknown,
  trackingNumber: TrackingNumber,
  depth = 0
): FieldRecord | null {
  if (depth > 12) return null;

  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findTrackingRecord(item, trackingNumber, depth + 1);
      if (found) return found;
    }
    return null;
  }

  if (!isRecord(value)) return null;

  if (!belongsTo(value, trackingNumber)) return null;

  const status = statusText(field(value, STATUS_KEYS));
  const location = locationText(field(value, LOCATION_KEYS));
  if (status && location) {
    return {
      status,
      location,
      description: scalarText(field(value, DESCRIPTION_KEYS)) || status,
      timestamp: timestampValue(field(value, TIMESTAMP_KEYS)),
    };
  }

  for (const child of Object.values(value)) {
    if (typeof child !== 'object' || child === null) continue;
    const found = findTrackingRecord(child, trackingNumber, depth + 1);
    if (found) return found;
  }
  return null;
}
