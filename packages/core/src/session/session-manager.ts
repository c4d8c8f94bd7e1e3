import { createHash } from 'node:crypto';
import type { CarrierTag } from '../types/tracking-number.js';
import type { Logger } from '../interfaces/logger.js';
import { KeyedMutex } from '../utils/concurrency.js';
import { FINGERPRINT_CATALOG, type Fingerprint } from './fingerprint-catalog.js';
import type { ProxyPool } from './proxy-pool.js';
import { Session } from './session.js';

export interface SessionManagerOptions {
  /** Session lifetime, default 5 minutes */
  ttlMs?: number;
  /** Live sessions per carrier, default 2 */
  poolSize?: number;
  catalog?: readonly Fingerprint[];
  /** Forward proxies bound to session identities and rotated with them */
  proxies?: ProxyPool;
  now?: () => number;
  logger?: Logger;
}

export interface SessionPoolStats {
  sessions: number;
  leased: number;
  rotations: number;
}

function carrierSeed(carrier: CarrierTag): number {
  return createHash('sha256').update(carrier).digest().readUInt32BE(0);
}

/**
 * SessionManager
 * Owns every Session. Pools them per carrier under a hard cap and hands out the
 * least-loaded one; sessions are never shared across carriers.
 *
 * Fingerprints are sampled deterministically: carrier seed plus a per-carrier
 * generation counter indexes the catalog, so the first session for a carrier always
 * presents the same identity and each rotation moves to the next one.
 */
export class SessionManager {
  private readonly pools = new Map<CarrierTag, Session[]>();
  private readonly generations = new Map<CarrierTag, number>();
  private readonly waiters = new Map<CarrierTag, Array<() => void>>();
  private readonly mutex = new KeyedMutex();
  private readonly ttlMs: number;
  private readonly poolSize: number;
  private readonly catalog: readonly Fingerprint[];
  private readonly proxies?: ProxyPool;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(opts: SessionManagerOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 5 * 60_000;
    this.poolSize = opts.poolSize ?? 2;
    this.catalog = opts.catalog ?? FINGERPRINT_CATALOG;
    this.proxies = opts.proxies;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger;
    if (this.catalog.length === 0) {
      throw new RangeError('Fingerprint catalog must not be empty');
    }
  }

  /**
   * Lease a session. Expired sessions still held by someone count toward the cap;
   * when they fill it, the call waits until one of them is released.
   */
  async acquireSession(carrier: CarrierTag): Promise<Session> {
    for (;;) {
      const leased = await this.mutex.runExclusive(carrier, () => this.tryLease(carrier));
      if (leased instanceof Session) return leased;
      await leased.wait;
    }
  }

  /**
   * Return a borrowed session. Expired sessions are destroyed once nobody holds them.
   */
  releaseSession(carrier: CarrierTag, session: Session): void {
    if (session.carrier !== carrier) {
      throw new Error(`Session ${session.id} belongs to '${session.carrier}', not '${carrier}'`);
    }
    session.unlease();
    if (session.leases === 0 && session.isExpired(this.now())) {
      this.prune(carrier);
      this.waiters.get(carrier)?.shift()?.();
    }
  }

  /**
   * Respond to a block: give the session (or every live session of the carrier) a
   * different fingerprint, and a different proxy once the current one is marked
   * blocked for the carrier
   */
  async rotate(carrier: CarrierTag, session?: Session): Promise<void> {
    await this.mutex.runExclusive(carrier, () => {
      const targets = session ? [session] : (this.pools.get(carrier) ?? []).filter((s) => !s.isDestroyed);
      for (const target of targets) {
        const previous = target.fingerprint;
        let next = this.nextFingerprint(carrier);
        for (let i = 0; next.id === previous.id && i < this.catalog.length; i++) {
          next = this.nextFingerprint(carrier);
        }
        const previousProxy = target.proxy;
        if (previousProxy) this.proxies?.markBlocked(previousProxy.id, carrier);
        const nextProxy = this.proxies?.select(carrier, previousProxy?.id);
        target.replaceFingerprint(next, nextProxy);
        this.logger?.info('session fingerprint rotated', {
          carrier,
          sessionId: target.id,
          from: previous.id,
          to: next.id,
          rotations: target.rotations,
          ...(this.proxies && { proxyFrom: previousProxy?.id, proxyTo: nextProxy?.id }),
        });
      }
    });
  }

  stats(): Record<CarrierTag, SessionPoolStats> {
    const out: Record<CarrierTag, SessionPoolStats> = {};
    for (const [carrier, pool] of this.pools) {
      out[carrier] = {
        sessions: pool.length,
        leased: pool.reduce((n, s) => n + s.leases, 0),
        rotations: pool.reduce((n, s) => n + s.rotations, 0),
      };
    }
    return out;
  }

  /**
   * Destroy every session
   */
  shutdown(): void {
    for (const pool of this.pools.values()) {
      for (const session of pool) session.destroy();
    }
    this.pools.clear();
    this.generations.clear();
    for (const queue of this.waiters.values()) {
      for (const wake of queue.splice(0)) wake();
    }
  }

  /** A leased session, or a promise that settles once a slot may have freed up */
  private tryLease(carrier: CarrierTag): Session | { wait: Promise<void> } {
    const pool = this.prune(carrier);
    const live = pool.filter((s) => !s.isExpired(this.now()));

    let session = live.find((s) => s.leases === 0);
    if (!session && pool.length < this.poolSize) {
      session = new Session(carrier, this.nextFingerprint(carrier), this.ttlMs, this.now);
      session.bindProxy(this.proxies?.select(carrier));
      pool.push(session);
      this.logger?.debug('session created', {
        carrier,
        sessionId: session.id,
        fingerprint: session.fingerprint.id,
        proxy: session.proxy?.id,
        poolSize: pool.length,
      });
    }
    if (!session && live.length > 0) {
      // pool full: share the least-loaded live session
      session = live.reduce((best, s) => (s.leases < best.leases ? s : best));
    }
    if (!session) {
      this.logger?.debug('session pool held by expired sessions, waiting', { carrier, poolSize: pool.length });
      const wait = new Promise<void>((resolve) => {
        const queue = this.waiters.get(carrier) ?? [];
        queue.push(resolve);
        this.waiters.set(carrier, queue);
      });
      return { wait };
    }

    session.lease();
    return session;
  }

  private nextFingerprint(carrier: CarrierTag): Fingerprint {
    const generation = this.generations.get(carrier) ?? 0;
    this.generations.set(carrier, generation + 1);
    return this.catalog[(carrierSeed(carrier) + generation) % this.catalog.length];
  }

  private prune(carrier: CarrierTag): Session[] {
    const pool = this.pools.get(carrier) ?? [];
    const kept: Session[] = [];
    for (const session of pool) {
      if (session.isExpired(this.now()) && session.leases === 0) {
        session.destroy();
        this.logger?.debug('session expired', { carrier, sessionId: session.id });
      } else {
        kept.push(session);
      }
    }
    this.pools.set(carrier, kept);
    return kept;
  }
}
