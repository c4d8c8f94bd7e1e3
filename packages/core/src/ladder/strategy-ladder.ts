import type { EngineContext } from '../interfaces/engine-context.js';
import type { ExtractionParser, RawExtraction } from '../interfaces/parser.js';
import type { RetrievedPayload } from '../interfaces/strategy.js';
import type { StrategyAttempt, RetrievalErrorKind, AttemptOutcome } from '../types/attempt.js';
import type { CarrierProfile, StrategyStep } from '../types/carrier.js';
import type { TrackingNumber } from '../types/tracking-number.js';
import type { TrackingResult } from '../types/tracking.js';
import type { Session } from '../session/session.js';
import type { SessionManager } from '../session/session-manager.js';
import type { StrategyRegistry } from '../strategies/registry.js';
import { analyzeContent, DEFAULT_CLASSIFIER_THRESHOLDS, type ClassifierThresholds } from '../classify/content-classifier.js';
import { NotImplementedError, RetrievalError, translateHttpError } from '../errors/index.js';
import { exhausted, normalize, summarizeAttempts } from '../normalize/result-normalizer.js';
import { DEFAULT_PARSERS, extract } from '../parsers/registry.js';
import { jitter, linkSignals, raceAbort, sleep, type LinkedSignal } from '../utils/async.js';
import { safeLog } from '../utils/logging-helpers.js';
import { errorToLog, truncateString } from '../utils/logging.js';
import { collapseWhitespace, stripTags } from '../utils/text.js';

export type LadderState = 'PENDING' | 'ATTEMPTING' | 'SUCCEEDED' | 'EXHAUSTED';

export interface LadderTransition {
  state: LadderState;
  carrier: string;
  trackingNumber: string;
  /** Set while ATTEMPTING */
  stepId?: string;
  index?: number;
}

export interface StrategyLadderOptions {
  sessions: SessionManager;
  strategies: StrategyRegistry;
  parsers?: readonly ExtractionParser[];
  classifier?: ClassifierThresholds;
  /** Whole-ladder budget, default 50 s */
  requestDeadlineMs?: number;
  /** Pause between attempts, default 250-1000 ms */
  minDelayMs?: number;
  maxDelayMs?: number;
  rotationPenalty?: number;
  random?: () => number;
  onTransition?: (transition: LadderTransition) => void;
}

interface AttemptResult {
  attempt: StrategyAttempt;
  extraction?: RawExtraction;
}

const VERDICT_ERRORS: Record<string, RetrievalErrorKind | undefined> = {
  ANTI_BOT_BLOCK: 'AntiBotBlocked',
  SCRIPT_NOT_DATA: 'ScriptMisclassification',
};

function outcomeFor(kind: RetrievalErrorKind): AttemptOutcome {
  switch (kind) {
    case 'Timeout':
      return 'Timeout';
    case 'NotConfigured':
    case 'Cancelled':
      return 'Skipped';
    default:
      return 'NetworkError';
  }
}

/**
 * StrategyLadder
 * Runs a carrier's strategies strictly in order for one tracking number:
 * fetch, classify, parse, and stop at the first parser hit.
 *
 * Each attempt runs under its own timeout, all of them under the request deadline and
 * the caller's signal. Nothing thrown by a strategy escapes: every failure becomes an
 * attempt record and, once the ladder runs out, a failed TrackingResult.
 */
export class StrategyLadder {
  private readonly sessions: SessionManager;
  private readonly strategies: StrategyRegistry;
  private readonly parsers: readonly ExtractionParser[];
  private readonly thresholds: ClassifierThresholds;
  private readonly deadlineMs: number;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly rotationPenalty?: number;
  private readonly random: () => number;
  private readonly onTransition?: (transition: LadderTransition) => void;

  constructor(private readonly ctx: EngineContext, opts: StrategyLadderOptions) {
    this.sessions = opts.sessions;
    this.strategies = opts.strategies;
    this.parsers = opts.parsers ?? DEFAULT_PARSERS;
    this.thresholds = opts.classifier ?? DEFAULT_CLASSIFIER_THRESHOLDS;
    this.deadlineMs = opts.requestDeadlineMs ?? 50_000;
    this.minDelayMs = opts.minDelayMs ?? 250;
    this.maxDelayMs = opts.maxDelayMs ?? 1_000;
    this.rotationPenalty = opts.rotationPenalty;
    this.random = opts.random ?? Math.random;
    this.onTransition = opts.onTransition;
  }

  async run(trackingNumber: TrackingNumber, profile: CarrierProfile, signal?: AbortSignal): Promise<TrackingResult> {
    const ctx: EngineContext = { ...this.ctx, operationName: this.ctx.operationName ?? 'track' };
    const carrier = profile.carrier;
    const emit = (state: LadderState, step?: StrategyStep, index?: number) =>
      this.onTransition?.({ state, carrier, trackingNumber: trackingNumber.normalized, stepId: step?.id, index });

    emit('PENDING');
    if (profile.strategies.length === 0) {
      emit('EXHAUSTED');
      return exhausted(trackingNumber, carrier, [], { errorKind: 'NotConfigured' });
    }

    const attempts: StrategyAttempt[] = [];
    const deadline = linkSignals([signal], this.deadlineMs, `Request deadline of ${this.deadlineMs}ms exceeded`);
    let session: Session | undefined;

    try {
      session = await this.sessions.acquireSession(carrier);

      for (const [index, step] of profile.strategies.entries()) {
        if (index > 0) {
          const delay = jitter(this.minDelayMs, this.maxDelayMs, this.random);
          const paused = await sleep(delay, deadline.signal).then(
            () => true,
            () => false
          );
          if (!paused) break;
        }
        if (deadline.signal.aborted) break;

        emit('ATTEMPTING', step, index);
        const result = await this.attempt(trackingNumber, profile, step, session, deadline, ctx);
        attempts.push(result.attempt);
        this.record(ctx, profile, result.attempt);

        if (result.extraction) {
          emit('SUCCEEDED', step, index);
          const success = normalize(result.extraction, attempts, {
            trackingNumber,
            carrier,
            step,
            statusAliases: profile.statusAliases,
            rotationPenalty: this.rotationPenalty,
          });
          safeLog(ctx.logger, 'info', 'tracking resolved', {
            carrier,
            trackingNumber: trackingNumber.normalized,
            status: success.status,
            strategyId: step.id,
            parserId: success.provenance.parserId,
            attempts: attempts.length,
          }, ctx);
          ctx.telemetry?.incrementCounter('protrace.track.result', 1, { carrier, success: 'true' });
          return success;
        }

        if (result.attempt.verdict === 'ANTI_BOT_BLOCK') {
          await this.sessions.rotate(carrier, session);
        }
      }
    } finally {
      deadline.dispose();
      if (session) this.sessions.releaseSession(carrier, session);
    }

    emit('EXHAUSTED');
    const failure = exhausted(trackingNumber, carrier, attempts, this.failureReason(signal, deadline, attempts));
    safeLog(ctx.logger, 'warn', 'tracking failed', {
      carrier,
      trackingNumber: trackingNumber.normalized,
      errorKind: failure.errorKind,
      reason: failure.reason,
    }, ctx);
    ctx.telemetry?.incrementCounter('protrace.track.result', 1, { carrier, success: 'false' });
    return failure;
  }

  private failureReason(
    signal: AbortSignal | undefined,
    deadline: LinkedSignal,
    attempts: readonly StrategyAttempt[]
  ): { reason?: string; errorKind?: RetrievalErrorKind } {
    const tried = attempts.length > 0 ? ` (${summarizeAttempts(attempts)})` : '';
    if (signal?.aborted) {
      return { reason: `Request cancelled${tried}`, errorKind: 'Cancelled' };
    }
    if (deadline.timedOut()) {
      return { reason: `Request deadline of ${this.deadlineMs}ms exceeded${tried}`, errorKind: 'Timeout' };
    }
    return {};
  }

  private async attempt(
    trackingNumber: TrackingNumber,
    profile: CarrierProfile,
    step: StrategyStep,
    session: Session,
    deadline: LinkedSignal,
    ctx: EngineContext
  ): Promise<AttemptResult> {
    const strategy = this.strategies[step.kind];
    const timeoutMs = step.timeoutMs ?? strategy.defaultTimeoutMs;
    const startedAt = new Date();
    const base = {
      strategyId: step.id,
      kind: step.kind,
      startedAt,
      fingerprintId: session.fingerprint.id,
      ...(session.proxy && { proxyId: session.proxy.id }),
    };
    const link = linkSignals([deadline.signal], timeoutMs, `Timed out after ${timeoutMs}ms`);

    let payload: RetrievedPayload;
    try {
      payload = await raceAbort(
        strategy.execute({ trackingNumber, profile, step, session, signal: link.signal, timeoutMs, ctx }),
        link.signal
      );
    } catch (error) {
      const failure = this.toRetrievalError(error, step, link);
      safeLog(ctx.logger, 'debug', 'strategy failed', {
        carrier: profile.carrier,
        strategyId: step.id,
        errorKind: failure.kind,
        error: errorToLog(error),
      }, ctx);
      return {
        attempt: {
          ...base,
          finishedAt: new Date(),
          payloadSize: 0,
          ...(failure.status !== undefined && { httpStatus: failure.status }),
          outcome: outcomeFor(failure.kind),
          errorKind: failure.kind,
          detail: failure.message,
        },
      };
    } finally {
      link.dispose();
    }

    const analysis = analyzeContent(payload, profile, this.thresholds);
    safeLog(ctx.logger, 'debug', 'strategy payload classified', {
      carrier: profile.carrier,
      strategyId: step.id,
      status: payload.status,
      verdict: analysis.verdict,
      reason: analysis.reason,
      excerpt: truncateString(collapseWhitespace(stripTags(payload.body)), 200),
      raw: payload.body,
    }, ctx);

    const received = {
      ...base,
      payloadSize: analysis.size,
      httpStatus: payload.status,
      verdict: analysis.verdict,
    };

    if (analysis.verdict !== 'USABLE_CONTENT') {
      return {
        attempt: {
          ...received,
          finishedAt: new Date(),
          outcome: analysis.verdict === 'ANTI_BOT_BLOCK' ? 'Blocked' : 'NoData',
          errorKind: VERDICT_ERRORS[analysis.verdict],
          detail: analysis.reason,
        },
      };
    }

    const extraction = extract(payload, trackingNumber, this.parsers, ctx.logger);
    if (!extraction) {
      return {
        attempt: {
          ...received,
          finishedAt: new Date(),
          outcome: 'NoData',
          errorKind: 'ParseFailure',
          detail: 'usable content but no parser matched',
        },
      };
    }

    return {
      attempt: { ...received, finishedAt: new Date(), outcome: 'Success', parserId: extraction.parserId },
      extraction,
    };
  }

  private toRetrievalError(error: unknown, step: StrategyStep, link: LinkedSignal): RetrievalError {
    if (error instanceof RetrievalError) return error;
    if (error instanceof NotImplementedError) {
      return new RetrievalError(error.message, 'NotConfigured', { strategyId: step.id });
    }
    if (link.signal.aborted && !link.timedOut()) {
      return new RetrievalError('Request cancelled', 'Cancelled', { strategyId: step.id });
    }
    return translateHttpError(error, step.id, { timedOut: link.timedOut() });
  }

  private record(ctx: EngineContext, profile: CarrierProfile, attempt: StrategyAttempt): void {
    const tags = { carrier: profile.carrier, strategy: attempt.kind, outcome: attempt.outcome };
    ctx.telemetry?.recordHistogram(
      'protrace.attempt.duration_ms',
      attempt.finishedAt.getTime() - attempt.startedAt.getTime(),
      tags
    );
    ctx.telemetry?.incrementCounter('protrace.attempt.outcome', 1, tags);
  }
}
