import { RetrievalError } from '../errors/index.js';

/**
 * Uniform random delay in [minMs, maxMs]
 */
export function jitter(minMs: number, maxMs: number, random: () => number = Math.random): number {
  if (maxMs <= minMs) return Math.max(0, minMs);
  return Math.round(minMs + (maxMs - minMs) * random());
}

/**
 * Sleep that rejects with the signal's reason when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  if (ms <= 0) return Promise.resolve();

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  /** True when this link's own timer fired (as opposed to a parent aborting) */
  timedOut(): boolean;
  /** Clears the timer and parent listeners */
  dispose(): void;
}

/**
 * Child signal that aborts when any parent aborts or after timeoutMs.
 * The timer aborts with a Timeout RetrievalError as reason.
 */
export function linkSignals(
  parents: ReadonlyArray<AbortSignal | undefined>,
  timeoutMs?: number,
  timeoutMessage = `Timed out after ${timeoutMs}ms`
): LinkedSignal {
  const controller = new AbortController();
  let fired = false;
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      fired = true;
      controller.abort(new RetrievalError(timeoutMessage, 'Timeout'));
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    timedOut: () => fired,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * Settle with whichever comes first: the promise or the signal's abort.
 * The losing promise keeps running; its rejection is observed and dropped.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
