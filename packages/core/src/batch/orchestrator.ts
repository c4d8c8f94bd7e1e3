import type { EngineContext } from '../interfaces/engine-context.js';
import type { BatchJob } from '../types/batch.js';
import type { CarrierLimits } from '../types/carrier.js';
import type { CarrierTag, TrackingNumber } from '../types/tracking-number.js';
import type { TrackingResult } from '../types/tracking.js';
import { createTrackingNumber } from '../identify/tracking-number.js';
import { exhausted } from '../normalize/result-normalizer.js';
import { Semaphore } from '../utils/concurrency.js';
import { safeLog } from '../utils/logging-helpers.js';
import { errorToLog } from '../utils/logging.js';
import type { CarrierLimiter } from './carrier-limiter.js';

/**
 * What to do with one batch item: run a ladder for a carrier, or report a result
 * decided up front (invalid number, unknown carrier)
 */
export type BatchPlan =
  | {
      kind: 'run';
      carrier: CarrierTag;
      limits?: CarrierLimits;
      run: (signal?: AbortSignal) => Promise<TrackingResult>;
    }
  | { kind: 'resolved'; result: TrackingResult };

export type BatchPlanner = (trackingNumber: TrackingNumber, carrierHint?: string) => BatchPlan;

export interface BatchOptions {
  /** Carrier to use for every item instead of identifying each one */
  carrierHint?: string;
  signal?: AbortSignal;
}

export interface BatchOrchestratorOptions {
  planner: BatchPlanner;
  limiter: CarrierLimiter;
  /** Items running at once across all carriers */
  concurrency: number;
}

function plural(count: number): string {
  return `${count} tracking number${count === 1 ? '' : 's'}`;
}

export function summarizeBatch(total: number, succeeded: number, failed: number): string {
  if (total === 0) return 'No tracking numbers to resolve';
  if (failed === 0) return `Resolved all ${plural(total)}`;
  if (succeeded === 0) return `Failed to resolve all ${plural(total)}`;
  return `Resolved ${succeeded} of ${plural(total)} (${failed} failed)`;
}

/**
 * BatchOrchestrator
 * Fans items out under a global pool and each carrier's own ceiling. One item's
 * failure never cancels its siblings; only the caller's signal does, and items that
 * had not started by then resolve as cancelled failures.
 */
export class BatchOrchestrator {
  private readonly pool: Semaphore;

  constructor(private readonly ctx: EngineContext, private readonly opts: BatchOrchestratorOptions) {
    this.pool = new Semaphore(opts.concurrency);
  }

  /**
   * Resolve a single item under the same ceilings a batch uses
   */
  track(trackingNumber: TrackingNumber, opts: BatchOptions = {}): Promise<TrackingResult> {
    const ctx: EngineContext = { ...this.ctx, operationName: this.ctx.operationName ?? 'track' };
    return this.resolveItem(trackingNumber, opts, ctx, () => undefined);
  }

  async trackBatch(inputs: readonly string[], opts: BatchOptions = {}): Promise<BatchJob> {
    const ctx: EngineContext = { ...this.ctx, operationName: this.ctx.operationName ?? 'trackBatch' };
    const startedAt = new Date();
    const items = inputs.map((input) => createTrackingNumber(input));
    let attempted = 0;

    safeLog(ctx.logger, 'info', 'batch started', { items: items.length }, ctx);

    const results = await Promise.all(
      items.map((trackingNumber) =>
        this.resolveItem(trackingNumber, opts, ctx, () => {
          attempted++;
        })
      )
    );

    const succeeded = results.filter((result) => result.success).length;
    const failed = results.length - succeeded;
    const job: BatchJob = {
      items,
      results,
      attempted,
      succeeded,
      failed,
      allSucceeded: failed === 0 && items.length > 0,
      allFailed: succeeded === 0 && items.length > 0,
      someFailed: succeeded > 0 && failed > 0,
      summary: summarizeBatch(items.length, succeeded, failed),
      startedAt,
      finishedAt: new Date(),
    };

    safeLog(ctx.logger, failed > 0 ? 'warn' : 'info', 'batch finished', {
      summary: job.summary,
      attempted,
      succeeded,
      failed,
    }, ctx);
    ctx.telemetry?.recordHistogram('protrace.batch.duration_ms', job.finishedAt.getTime() - startedAt.getTime(), {
      items: String(items.length),
    });
    return job;
  }

  private async resolveItem(
    trackingNumber: TrackingNumber,
    { carrierHint, signal }: BatchOptions,
    ctx: EngineContext,
    onStart: () => void
  ): Promise<TrackingResult> {
    const plan = this.opts.planner(trackingNumber, carrierHint);
    if (plan.kind === 'resolved') {
      onStart();
      return plan.result;
    }

    try {
      return await this.opts.limiter.run(
        plan.carrier,
        plan.limits,
        () =>
          this.pool.run(() => {
            onStart();
            return plan.run(signal);
          }, signal),
        signal
      );
    } catch (error) {
      if (signal?.aborted) {
        return exhausted(trackingNumber, plan.carrier, [], {
          errorKind: 'Cancelled',
          reason: 'Request cancelled before any strategy ran',
        });
      }
      safeLog(ctx.logger, 'error', 'tracking request failed unexpectedly', {
        carrier: plan.carrier,
        trackingNumber: trackingNumber.normalized,
        error: errorToLog(error),
      }, ctx);
      return exhausted(trackingNumber, plan.carrier, [], {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
