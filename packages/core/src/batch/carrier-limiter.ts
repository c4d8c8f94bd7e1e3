import type { CarrierLimits } from '../types/carrier.js';
import type { CarrierTag } from '../types/tracking-number.js';
import { IntervalGate, Semaphore } from '../utils/concurrency.js';

interface Lane {
  semaphore: Semaphore;
  gate: IntervalGate;
}

export interface LaneStats {
  inFlight: number;
  pending: number;
}

/**
 * Per-carrier concurrency and start-rate ceilings.
 * Lanes are created on first use and never share slots across carriers.
 */
export class CarrierLimiter {
  private readonly lanes = new Map<CarrierTag, Lane>();

  constructor(private readonly defaults: CarrierLimits) {}

  async run<T>(
    carrier: CarrierTag,
    limits: CarrierLimits | undefined,
    task: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const lane = this.lane(carrier, limits);
    const release = await lane.semaphore.acquire(signal);
    try {
      await lane.gate.wait(signal);
      return await task();
    } finally {
      release();
    }
  }

  stats(): Record<CarrierTag, LaneStats> {
    const out: Record<CarrierTag, LaneStats> = {};
    for (const [carrier, lane] of this.lanes) {
      out[carrier] = { inFlight: lane.semaphore.inFlight, pending: lane.semaphore.pending };
    }
    return out;
  }

  private lane(carrier: CarrierTag, limits: CarrierLimits = this.defaults): Lane {
    let lane = this.lanes.get(carrier);
    if (!lane) {
      lane = {
        semaphore: new Semaphore(limits.maxConcurrent),
        gate: new IntervalGate(limits.minIntervalMs),
      };
      this.lanes.set(carrier, lane);
    }
    return lane;
  }
}
