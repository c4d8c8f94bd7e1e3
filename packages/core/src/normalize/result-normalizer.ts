import type { RawExtraction } from '../interfaces/parser.js';
import type { StrategyAttempt, RetrievalErrorKind } from '../types/attempt.js';
import type { StrategyStep } from '../types/carrier.js';
import type { CarrierTag, TrackingNumber } from '../types/tracking-number.js';
import type { TrackingFailure, TrackingStatus, TrackingSuccess } from '../types/tracking.js';

/**
 * Vocabulary in match order. The first status whose phrase appears in the text wins,
 * so "Delivered" beats "Exception" in "Delivered - exception cleared".
 */
const STATUS_VOCABULARY: ReadonlyArray<[TrackingStatus, readonly string[]]> = [
  ['Delivered', ['delivered']],
  ['OutForDelivery', ['out for delivery', 'on vehicle for delivery']],
  ['InTransit', ['in transit', 'en route']],
  ['PickedUp', ['picked up']],
  ['Exception', ['exception']],
];

const DEFAULT_ROTATION_PENALTY = 0.1;
const CONFIDENCE_FLOOR = 0.1;

export interface NormalizeContext {
  trackingNumber: TrackingNumber;
  carrier: CarrierTag;
  step: Pick<StrategyStep, 'id' | 'kind'>;
  statusAliases?: Readonly<Record<string, string>>;
  rotationPenalty?: number;
}

function applyAlias(text: string, aliases: Readonly<Record<string, string>>): string {
  const key = text.trim().toUpperCase();
  for (const [alias, replacement] of Object.entries(aliases)) {
    if (alias.toUpperCase() === key) return replacement;
  }
  return text;
}

/**
 * Map carrier free text onto the status vocabulary
 */
export function mapStatus(text: string, aliases: Readonly<Record<string, string>> = {}): TrackingStatus {
  const haystack = applyAlias(text, aliases).toLowerCase().replace(/[_-]+/g, ' ').replace(/\s+/g, ' ');
  for (const [status, phrases] of STATUS_VOCABULARY) {
    if (phrases.some((phrase) => haystack.includes(phrase))) return status;
  }
  return 'Unknown';
}

/**
 * Fingerprint rotations performed during a request: one per blocked attempt
 */
export function rotationsIn(attempts: readonly StrategyAttempt[]): number {
  return attempts.filter((attempt) => attempt.outcome === 'Blocked').length;
}

export function discountConfidence(base: number, rotations: number, penalty = DEFAULT_ROTATION_PENALTY): number {
  if (rotations <= 1) return base;
  const discounted = base * (1 - penalty * (rotations - 1));
  return Math.round(Math.max(CONFIDENCE_FLOOR, discounted) * 1000) / 1000;
}

function freezeAttempts(attempts: readonly StrategyAttempt[]): readonly StrategyAttempt[] {
  return Object.freeze(attempts.map((attempt) => Object.freeze({ ...attempt })));
}

/**
 * Build the success result for the extraction that ended the ladder
 */
export function normalize(
  extraction: RawExtraction,
  attempts: readonly StrategyAttempt[],
  context: NormalizeContext
): TrackingSuccess {
  const result: TrackingSuccess = {
    success: true,
    trackingNumber: context.trackingNumber.normalized,
    carrier: context.carrier,
    status: mapStatus(extraction.statusText, context.statusAliases),
    location: extraction.location,
    lastEventDescription: extraction.description,
    lastEventTimestamp: extraction.timestamp,
    provenance: Object.freeze({
      strategyId: context.step.id,
      strategyKind: context.step.kind,
      parserId: extraction.parserId,
    }),
    confidence: discountConfidence(extraction.confidence, rotationsIn(attempts), context.rotationPenalty),
    attempts: freezeAttempts(attempts),
  };
  return Object.freeze(result);
}

/**
 * "direct-fetch: <detail>; mirror:parcelsapp: <detail>"
 */
export function summarizeAttempts(attempts: readonly StrategyAttempt[]): string {
  return attempts.map((attempt) => `${attempt.strategyId}: ${attempt.detail ?? attempt.outcome}`).join('; ');
}

export interface FailureOptions {
  reason?: string;
  errorKind?: RetrievalErrorKind;
}

/**
 * Build the failure result. Without an explicit reason, each attempt is summarised.
 */
export function exhausted(
  trackingNumber: TrackingNumber | string,
  carrier: CarrierTag,
  attempts: readonly StrategyAttempt[],
  opts: FailureOptions = {}
): TrackingFailure {
  const reason =
    opts.reason ??
    (attempts.length > 0
      ? `All strategies exhausted (${summarizeAttempts(attempts)})`
      : `No retrieval strategies available for carrier '${carrier}'`);

  const result: TrackingFailure = {
    success: false,
    trackingNumber: typeof trackingNumber === 'string' ? trackingNumber : trackingNumber.normalized,
    carrier,
    status: 'Unknown',
    location: '',
    lastEventDescription: '',
    lastEventTimestamp: null,
    provenance: null,
    confidence: 0,
    reason,
    errorKind: opts.errorKind ?? 'AllStrategiesExhausted',
    attemptedStrategies: Array.from(new Set(attempts.map((attempt) => attempt.strategyId))),
    attempts: freezeAttempts(attempts),
  };
  return Object.freeze(result);
}
