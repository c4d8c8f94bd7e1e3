import type { EngineContext, LoggingOptions, TelemetryClient } from './interfaces/engine-context.js';
import type { HttpClient } from './interfaces/http-client.js';
import type { Logger } from './interfaces/logger.js';
import type { PageRenderer } from './interfaces/renderer.js';
import type { BatchJob } from './types/batch.js';
import type { CarrierProfile } from './types/carrier.js';
import { UNKNOWN_CARRIER, type CarrierIdentification, type TrackingNumber } from './types/tracking-number.js';
import type { TrackingResult } from './types/tracking.js';
import { BatchOrchestrator, type BatchOptions, type BatchPlan } from './batch/orchestrator.js';
import { CarrierLimiter, type LaneStats } from './batch/carrier-limiter.js';
import { parseEngineConfig } from './config/loader.js';
import { compileCarriers } from './config/profiles.js';
import type { EngineConfig } from './config/schema.js';
import { createAxiosHttpClient } from './http/axios-client.js';
import { createCarrierIdentifier } from './identify/carrier-identifier.js';
import { createTrackingNumber, isValidTrackingNumber } from './identify/tracking-number.js';
import { StrategyLadder, type LadderTransition } from './ladder/strategy-ladder.js';
import { exhausted } from './normalize/result-normalizer.js';
import { createPuppeteerRenderer } from './render/puppeteer-renderer.js';
import { ProxyPool, parseProxyUrl, type ProxyStats } from './session/proxy-pool.js';
import { SessionManager, type SessionPoolStats } from './session/session-manager.js';
import { createStrategyRegistry } from './strategies/registry.js';
import { safeLog } from './utils/logging-helpers.js';

export interface TrackerOptions {
  /** Engine configuration, validated and defaulted on creation */
  config: unknown;
  /** Defaults to the axios client */
  http?: HttpClient;
  logger?: Logger;
  telemetry?: TelemetryClient;
  loggingOptions?: LoggingOptions;
  /**
   * Browser for render steps. When absent one is launched from
   * `render.executablePath`; without either, render steps are skipped.
   */
  renderer?: PageRenderer;
  random?: () => number;
  onTransition?: (transition: LadderTransition) => void;
}

export type TrackOptions = BatchOptions;

export interface TrackerStats {
  sessions: Record<string, SessionPoolStats>;
  lanes: Record<string, LaneStats>;
  proxies: ProxyStats[];
}

export interface Tracker {
  track(trackingNumber: string, opts?: TrackOptions): Promise<TrackingResult>;
  trackBatch(trackingNumbers: readonly string[], opts?: TrackOptions): Promise<BatchJob>;
  identify(trackingNumber: string, carrierHint?: string): CarrierIdentification;
  /** Every carrier whose rules match, best first */
  candidates(trackingNumber: string): Array<{ carrier: string; confidence: number }>;
  carriers(): CarrierProfile[];
  stats(): TrackerStats;
  /** Destroy sessions and close a browser the tracker launched */
  shutdown(): Promise<void>;
}

function invalidNumber(trackingNumber: TrackingNumber): TrackingResult {
  return exhausted(trackingNumber, UNKNOWN_CARRIER, [], {
    errorKind: 'InvalidTrackingNumber',
    reason: `'${trackingNumber.raw}' is not a valid tracking number (expected 5 to 30 letters and digits)`,
  });
}

function unknownCarrier(trackingNumber: TrackingNumber): TrackingResult {
  return exhausted(trackingNumber, UNKNOWN_CARRIER, [], {
    errorKind: 'NotConfigured',
    reason: `Could not identify the carrier for '${trackingNumber.normalized}'`,
  });
}

/**
 * Create the in-process tracking API.
 *
 * @example
 * ```typescript
 * const tracker = createTracker({ config: await loadEngineConfig(), logger: console });
 * const result = await tracker.track('PRO# 0628-143046');
 * if (result.success) console.log(result.status, result.location);
 * else console.log(result.reason);
 * await tracker.shutdown();
 * ```
 */
export function createTracker(opts: TrackerOptions): Tracker {
  const config: EngineConfig = parseEngineConfig(opts.config);
  const { profiles, rules } = compileCarriers(config);
  const identifier = createCarrierIdentifier(rules, new Set(profiles.keys()));

  const ownsRenderer = !opts.renderer && config.render.executablePath !== undefined;
  const renderer =
    opts.renderer ??
    (config.render.executablePath
      ? createPuppeteerRenderer({
          executablePath: config.render.executablePath,
          headless: config.render.headless,
          logger: opts.logger,
        })
      : undefined);

  const ctx: EngineContext = {
    http: opts.http ?? createAxiosHttpClient({ logger: opts.logger }),
    logger: opts.logger,
    telemetry: opts.telemetry,
    loggingOptions: opts.loggingOptions,
  };

  const proxies = new ProxyPool(config.proxies.servers.map(parseProxyUrl), {
    maxBlockedCarriers: config.proxies.maxBlockedCarriers,
    logger: opts.logger,
  });
  const sessions = new SessionManager({
    ttlMs: config.session.ttlMs,
    poolSize: config.session.poolSize,
    proxies: proxies.size > 0 ? proxies : undefined,
    logger: opts.logger,
  });
  const ladder = new StrategyLadder(ctx, {
    sessions,
    strategies: createStrategyRegistry({
      timeouts: config.timeouts,
      passThrough: {
        statuses: config.ladder.passThroughStatuses,
        minBodyBytes: config.classifier.minContentBytes,
      },
      renderer,
    }),
    classifier: config.classifier,
    requestDeadlineMs: config.ladder.requestDeadlineMs,
    minDelayMs: config.ladder.minDelayMs,
    maxDelayMs: config.ladder.maxDelayMs,
    rotationPenalty: config.ladder.rotationPenalty,
    random: opts.random,
    onTransition: opts.onTransition,
  });

  const limiter = new CarrierLimiter({
    maxConcurrent: config.batch.maxConcurrentPerCarrier,
    minIntervalMs: config.batch.minIntervalMs,
  });

  const plan = (trackingNumber: TrackingNumber, carrierHint?: string): BatchPlan => {
    if (!isValidTrackingNumber(trackingNumber)) {
      return { kind: 'resolved', result: invalidNumber(trackingNumber) };
    }
    const identification = identifier.identify(trackingNumber, carrierHint);
    const profile = profiles.get(identification.carrier);
    if (!profile) {
      safeLog(ctx.logger, 'warn', 'carrier not identified', {
        trackingNumber: trackingNumber.normalized,
        carrierHint,
      }, ctx);
      return { kind: 'resolved', result: unknownCarrier(trackingNumber) };
    }
    safeLog(ctx.logger, 'debug', 'carrier identified', {
      trackingNumber: trackingNumber.normalized,
      carrier: profile.carrier,
      confidence: identification.confidence,
    }, ctx);
    return {
      kind: 'run',
      carrier: profile.carrier,
      limits: profile.limits,
      run: (signal) => ladder.run(trackingNumber, profile, signal),
    };
  };

  const orchestrator = new BatchOrchestrator(ctx, {
    planner: plan,
    limiter,
    concurrency: config.batch.concurrency ?? 2 * profiles.size,
  });

  return {
    track(trackingNumber, trackOpts) {
      return orchestrator.track(createTrackingNumber(trackingNumber), trackOpts);
    },

    trackBatch(trackingNumbers, trackOpts) {
      return orchestrator.trackBatch(trackingNumbers, trackOpts);
    },

    identify(trackingNumber, carrierHint) {
      return identifier.identify(trackingNumber, carrierHint);
    },

    candidates(trackingNumber) {
      return identifier.candidates(trackingNumber);
    },

    carriers() {
      return Array.from(profiles.values());
    },

    stats() {
      return { sessions: sessions.stats(), lanes: limiter.stats(), proxies: proxies.stats() };
    },

    async shutdown() {
      sessions.shutdown();
      if (ownsRenderer && renderer) await renderer.close();
    },
  };
}
