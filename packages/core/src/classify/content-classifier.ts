import type { Verdict } from '../types/attempt.js';
import type { CarrierProfile } from '../types/carrier.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import { DEFAULT_ANTI_BOT_KEYWORDS } from '../config/schema.js';
import { stripTags } from '../utils/text.js';

export interface ClassifierThresholds {
  /** Markup shorter than this is EMPTY (default 500 bytes) */
  minContentBytes: number;
  /** More markers than this in a short payload means SCRIPT_NOT_DATA (default 5) */
  scriptMarkerThreshold: number;
  /** Payloads at least this large are treated as real pages for the marker check (default 20 000) */
  realPageMinBytes: number;
  antiBotKeywords: readonly string[];
}

export const DEFAULT_CLASSIFIER_THRESHOLDS: ClassifierThresholds = Object.freeze({
  minContentBytes: 500,
  scriptMarkerThreshold: 5,
  realPageMinBytes: 20_000,
  antiBotKeywords: DEFAULT_ANTI_BOT_KEYWORDS,
});

export type BlockingMechanism =
  | 'cloudflare_challenge'
  | 'captcha'
  | 'rate_limit'
  | 'access_denied'
  | 'login_wall'
  | 'maintenance'
  | 'javascript_challenge'
  | 'generic';

export interface ContentAnalysis {
  verdict: Verdict;
  reason: string;
  /** Payload size in bytes */
  size: number;
  markerCount: number;
  mechanism?: BlockingMechanism;
}

const SCRIPT_MARKERS: readonly RegExp[] = [
  /\bfunction\s*[\w$]*\s*\(/g,
  /\b(?:var|let|const)\s+[\w$]+\s*=/g,
  /=>/g,
  /\.(?:getElementsByTagName|getElementById|querySelector(?:All)?|createElement|appendChild|insertBefore|addEventListener)\s*\(/g,
  /\b(?:document|window)\.[\w$]+/g,
  /\.push\s*\(/g,
  /gtm\.js|googletagmanager|dataLayer/g,
  /\}\s*\)\s*;/g,
  /\b(?:if|for|while)\s*\(/g,
];

const MECHANISM_KEYWORDS: ReadonlyArray<[BlockingMechanism, readonly string[]]> = [
  ['cloudflare_challenge', ['checking your browser', 'cf-browser-verification', 'cf-chl', 'just a moment', 'attention required']],
  ['captcha', ['captcha', 'verify you are human', 'are you a robot']],
  ['rate_limit', ['rate limit', 'too many requests']],
  ['login_wall', ['please log in', 'sign in to continue']],
  ['maintenance', ['under maintenance', 'temporarily unavailable']],
  ['access_denied', ['access denied', 'request blocked', 'forbidden']],
];

export function countScriptMarkers(text: string): number {
  let count = 0;
  for (const marker of SCRIPT_MARKERS) {
    count += text.match(marker)?.length ?? 0;
  }
  return count;
}

function headerValue(headers: RetrievedPayload['headers'], name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value.join(', ') : value;
}

const JS_GATE_PHRASES = ['enable javascript', 'javascript is required', 'javascript is disabled'];
const CF_CHALLENGE_MARKERS = ['challenge-platform', '__cf_chl', 'cf_chl_opt'];

/** A page whose only visible text asks the client to run scripts */
function isJavascriptGate(lower: string): boolean {
  if (!JS_GATE_PHRASES.some((phrase) => lower.includes(phrase))) return false;
  return stripTags(lower).trim().length < 200;
}

function mechanismFor(keyword: string): BlockingMechanism {
  for (const [mechanism, keywords] of MECHANISM_KEYWORDS) {
    if (keywords.some((k) => keyword.includes(k))) return mechanism;
  }
  return 'generic';
}

/**
 * JSON documents are judged by content rather than size; a compact API answer is
 * legitimately far below the markup minimum
 */
function decodeJsonDocument(body: string): unknown {
  const trimmed = body.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

function isEmptyJson(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0;
  return value !== null && typeof value === 'object' && Object.keys(value).length === 0;
}

/**
 * Below the minimum size, a payload that is nothing but script is reported as
 * SCRIPT_NOT_DATA instead of EMPTY
 */
function isBareScriptFragment(body: string, markerCount: number): boolean {
  return markerCount > 0 && /<script\b/i.test(body) && stripTags(body).trim().length === 0;
}

function toPayload(input: RetrievedPayload | string): RetrievedPayload {
  return typeof input === 'string' ? { body: input, status: 200, url: '', headers: {} } : input;
}

/**
 * Label a payload. Checks run in order and the first match wins:
 * EMPTY, ANTI_BOT_BLOCK, SCRIPT_NOT_DATA, then USABLE_CONTENT.
 */
export function analyzeContent(
  input: RetrievedPayload | string,
  profile?: Pick<CarrierProfile, 'blockKeywords'>,
  thresholds: ClassifierThresholds = DEFAULT_CLASSIFIER_THRESHOLDS
): ContentAnalysis {
  const payload = toPayload(input);
  const body = payload.body;
  const size = Buffer.byteLength(body, 'utf8');
  const markerCount = countScriptMarkers(body);
  const contentType = (payload.contentType ?? headerValue(payload.headers, 'content-type') ?? '').toLowerCase();

  // 1. EMPTY
  const json = contentType.includes('json') || body.trim().startsWith('{') || body.trim().startsWith('[')
    ? decodeJsonDocument(body)
    : undefined;
  if (json !== undefined) {
    if (isEmptyJson(json)) {
      return { verdict: 'EMPTY', reason: 'JSON document has no content', size, markerCount };
    }
  } else if (size < thresholds.minContentBytes) {
    if (isBareScriptFragment(body, markerCount)) {
      return {
        verdict: 'SCRIPT_NOT_DATA',
        reason: `script markup misclassified as content: bare script fragment of ${size} bytes`,
        size,
        markerCount,
      };
    }
    return {
      verdict: 'EMPTY',
      reason: `payload of ${size} bytes is below the ${thresholds.minContentBytes}-byte minimum`,
      size,
      markerCount,
    };
  }

  // 2. ANTI_BOT_BLOCK
  const lower = body.toLowerCase();
  const keywords = [...thresholds.antiBotKeywords, ...(profile?.blockKeywords ?? [])];
  const matched = keywords.find((keyword) => lower.includes(keyword.toLowerCase()));
  if (matched) {
    const mechanism = mechanismFor(matched.toLowerCase());
    return {
      verdict: 'ANTI_BOT_BLOCK',
      reason: `anti-bot block detected (${mechanism}): matched "${matched}"`,
      size,
      markerCount,
      mechanism,
    };
  }
  if (
    headerValue(payload.headers, 'cf-ray') !== undefined &&
    CF_CHALLENGE_MARKERS.some((marker) => lower.includes(marker))
  ) {
    return {
      verdict: 'ANTI_BOT_BLOCK',
      reason: 'anti-bot block detected (cloudflare_challenge): challenge script served behind cf-ray',
      size,
      markerCount,
      mechanism: 'cloudflare_challenge',
    };
  }
  if (headerValue(payload.headers, 'cf-mitigated') === 'challenge') {
    return {
      verdict: 'ANTI_BOT_BLOCK',
      reason: 'anti-bot block detected (cloudflare_challenge): cf-mitigated challenge header',
      size,
      markerCount,
      mechanism: 'cloudflare_challenge',
    };
  }
  if (payload.status === 429) {
    return {
      verdict: 'ANTI_BOT_BLOCK',
      reason: `anti-bot block detected (rate_limit): HTTP 429${headerValue(payload.headers, 'retry-after') ? `, retry-after ${headerValue(payload.headers, 'retry-after')}` : ''}`,
      size,
      markerCount,
      mechanism: 'rate_limit',
    };
  }

  if (isJavascriptGate(lower)) {
    return {
      verdict: 'ANTI_BOT_BLOCK',
      reason: 'anti-bot block detected (javascript_challenge): page requires script execution',
      size,
      markerCount,
      mechanism: 'javascript_challenge',
    };
  }

  // 3. SCRIPT_NOT_DATA
  if (contentType.includes('javascript') || contentType.includes('ecmascript')) {
    return {
      verdict: 'SCRIPT_NOT_DATA',
      reason: `script markup misclassified as content: served as ${contentType}`,
      size,
      markerCount,
    };
  }
  if (markerCount > thresholds.scriptMarkerThreshold && size < thresholds.realPageMinBytes) {
    return {
      verdict: 'SCRIPT_NOT_DATA',
      reason: `script markup misclassified as content: ${markerCount} syntax markers in ${size} bytes`,
      size,
      markerCount,
    };
  }

  return { verdict: 'USABLE_CONTENT', reason: 'usable content', size, markerCount };
}

/**
 * Verdict only
 */
export function classify(
  payload: RetrievedPayload | string,
  profile?: Pick<CarrierProfile, 'blockKeywords'>,
  thresholds?: ClassifierThresholds
): Verdict {
  return analyzeContent(payload, profile, thresholds).verdict;
}
