import type { TrackingNumber } from '../types/tracking-number.js';
import type { CarrierProfile, StrategyStep } from '../types/carrier.js';
import type { StrategyKind } from '../types/attempt.js';
import type { Session } from '../session/session.js';
import type { EngineContext } from './engine-context.js';

/**
 * Whatever a strategy brought back, before classification
 */
export interface RetrievedPayload {
  body: string;
  status: number;
  url: string;
  contentType?: string;
  headers: Record<string, string | string[]>;
}

export interface StrategyRequest {
  trackingNumber: TrackingNumber;
  profile: CarrierProfile;
  step: StrategyStep;
  /** Borrowed for this attempt only */
  session: Session;
  /** Fires on the per-strategy timeout, the request deadline or caller cancellation */
  signal: AbortSignal;
  timeoutMs: number;
  ctx: EngineContext;
}

/**
 * RetrievalStrategy
 * One way of fetching a tracking page. Throws a RetrievalError when nothing usable
 * came back at the transport level; content judgement belongs to the classifier.
 */
export interface RetrievalStrategy {
  readonly kind: StrategyKind;
  readonly defaultTimeoutMs: number;
  execute(request: StrategyRequest): Promise<RetrievedPayload>;
}
