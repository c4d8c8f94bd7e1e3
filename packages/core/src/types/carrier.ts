import type { CarrierTag } from './tracking-number.js';
import type { StrategyKind } from './attempt.js';

/**
 * Identification rule compiled from configuration
 */
export interface IdentificationRule {
  carrier: CarrierTag;
  pattern: RegExp;
  confidence: number;
  /** Higher wins; equal priorities keep configuration order */
  priority: number;
}

/**
 * One rung of a carrier's strategy ladder.
 * URL templates may contain {trackingNumber}, {rawTrackingNumber} and {carrierSlug}.
 */
export interface StrategyStep {
  id: string;
  kind: StrategyKind;
  url?: string;
  /** Page hosting the tracking form (form-submit) or challenge (challenge-bypass) */
  pageUrl?: string;
  method: "GET" | "POST";
  /** JSON body template for json-api steps */
  body?: Record<string, string>;
  /** Form field that receives the tracking number, guessed when absent */
  fieldName?: string;
  timeoutMs?: number;
}

export interface CarrierLimits {
  maxConcurrent: number;
  minIntervalMs: number;
}

/**
 * CarrierProfile
 * Built once from configuration at startup and never mutated.
 */
export interface CarrierProfile {
  readonly carrier: CarrierTag;
  readonly displayName: string;
  readonly baseUrls: readonly string[];
  readonly strategies: readonly StrategyStep[];
  /** Extra anti-bot phrases seen on this carrier's block pages */
  readonly blockKeywords: readonly string[];
  /** Path segment used by mirror sites for this carrier */
  readonly mirrorSlug: string;
  /** Carrier status codes mapped to free text the normalizer understands */
  readonly statusAliases: Readonly<Record<string, string>>;
  readonly limits: CarrierLimits;
}
