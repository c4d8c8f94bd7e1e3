import type { RawExtraction } from '../interfaces/parser.js';

const CODE_SYNTAX: readonly RegExp[] = [
  /=>/,
  /<\/?[a-z][^>]*>/i,
  /\bfunction\b/i,
  /\b(?:var|let|const)\s+[\w$]+\s*=/,
  /\b(?:document|window)\.\w/,
  /\.js\b/i,
  /\b\w+\([^)]*\)\s*[.;{]/,
  /\bgtm\b|dataLayer|getElementsBy/i,
];

// status and location values never contain these; descriptions sometimes do
const CODE_PUNCTUATION = /[{};]/;

const MAX_STATUS_LENGTH = 200;

/**
 * True when text reads like program code rather than a shipment status or place
 */
export function looksLikeCode(text: string): boolean {
  return CODE_PUNCTUATION.test(text) || CODE_SYNTAX.some((pattern) => pattern.test(text));
}

/**
 * Last check before a parser result leaves the parser
 */
export function isAcceptableExtraction(extraction: RawExtraction): boolean {
  const status = extraction.statusText.trim();
  if (!status || status.length > MAX_STATUS_LENGTH) return false;
  if (looksLikeCode(status) || looksLikeCode(extraction.location)) return false;
  return !CODE_SYNTAX.some((pattern) => pattern.test(extraction.description));
}
