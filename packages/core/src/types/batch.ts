import type { TrackingNumber } from './tracking-number.js';
import type { TrackingResult } from './tracking.js';

/**
 * Outcome of a batch run
 * One result per input, in the same order as the input list.
 *
 * @example
 * ```typescript
 * const job = await tracker.trackBatch(['0628143046', 'I123456789']);
 *
 * if (job.allSucceeded) {
 *   console.log('All shipments resolved');
 * } else if (job.someFailed) {
 *   console.log(job.summary); // "Resolved 1 of 2 tracking numbers (1 failed)"
 * }
 *
 * job.results.forEach((result) => {
 *   if (result.success) console.log(result.trackingNumber, result.status, result.location);
 *   else console.log(result.trackingNumber, result.reason);
 * });
 * ```
 */
export interface BatchJob {
  items: TrackingNumber[];

  results: TrackingResult[];

  /** Items for which a ladder run (or validation) completed */
  attempted: number;

  succeeded: number;

  failed: number;

  /**
   * Whether all items succeeded
   * True only if failed === 0 && items.length > 0
   */
  allSucceeded: boolean;

  /**
   * Whether all items failed
   * True only if succeeded === 0 && items.length > 0
   */
  allFailed: boolean;

  /**
   * Mixed results
   * True only if succeeded > 0 && failed > 0
   */
  someFailed: boolean;

  /**
   * Human-readable summary
   * Examples:
   * - "Resolved all 3 tracking numbers"
   * - "Resolved 2 of 3 tracking numbers (1 failed)"
   * - "Failed to resolve all 3 tracking numbers"
   */
  summary: string;

  startedAt: Date;
  finishedAt: Date;
}

/**
 * HTTP status for a batch job
 * - 200 when every item resolved, or when every item failed (a retrieval failure is
 *   not the client's fault; `allFailed` flags it)
 * - 207 Multi-Status for a mix
 */
export function getHttpStatusForBatchJob(job: Pick<BatchJob, 'someFailed'>): 200 | 207 {
  return job.someFailed ? 207 : 200;
}
