import { randomUUID } from 'node:crypto';
import type { CarrierTag } from '../types/tracking-number.js';
import type { Fingerprint } from './fingerprint-catalog.js';
import type { ProxyServer } from './proxy-pool.js';
import { CookieJar, type StoredCookie } from './cookie-jar.js';

export type RequestKind = 'document' | 'xhr' | 'form';

export interface HeaderOptions {
  kind: RequestKind;
  url: string;
  referer?: string;
  extra?: Record<string, string>;
}

/**
 * Session
 * One browser identity plus its cookie and token state for one carrier.
 *
 * Created, rotated and destroyed only by the SessionManager; strategies borrow it for
 * a single attempt. Header data is read-only between rotations. Cookie and token updates
 * are synchronous, so concurrent borrowers never observe a half-applied update.
 */
export class Session {
  readonly id: string = randomUUID();
  readonly createdAt: Date;
  readonly expiresAt: Date;

  private currentFingerprint: Fingerprint;
  private currentProxy?: ProxyServer;
  private readonly jar = new CookieJar();
  private readonly tokens = new Map<string, string>();
  private rotationCount = 0;
  private leaseCount = 0;
  private destroyed = false;

  constructor(
    readonly carrier: CarrierTag,
    fingerprint: Fingerprint,
    ttlMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.currentFingerprint = fingerprint;
    this.createdAt = new Date(now());
    this.expiresAt = new Date(this.createdAt.getTime() + ttlMs);
  }

  get fingerprint(): Fingerprint {
    return this.currentFingerprint;
  }

  /** Forward proxy bound to this identity; direct connection when absent */
  get proxy(): ProxyServer | undefined {
    return this.currentProxy;
  }

  /** Fingerprint rotations applied to this session */
  get rotations(): number {
    return this.rotationCount;
  }

  get leases(): number {
    return this.leaseCount;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  isExpired(at: number = this.now()): boolean {
    return at >= this.expiresAt.getTime();
  }

  /**
   * Browser-like headers for a request of the given kind, with cookies attached
   */
  buildHeaders(opts: HeaderOptions): Record<string, string> {
    const fp = this.currentFingerprint;
    const target = new URL(opts.url);
    const sameOrigin = opts.referer !== undefined && new URL(opts.referer).origin === target.origin;

    const headers: Record<string, string> = {
      'User-Agent': fp.userAgent,
      'Accept-Language': fp.acceptLanguage,
    };
    if (fp.clientHints) {
      Object.assign(headers, fp.clientHints);
    }

    if (opts.kind === 'xhr') {
      headers['Accept'] = 'application/json, text/plain, */*';
      headers['X-Requested-With'] = 'XMLHttpRequest';
      headers['Origin'] = opts.referer ? new URL(opts.referer).origin : target.origin;
      headers['Sec-Fetch-Dest'] = 'empty';
      headers['Sec-Fetch-Mode'] = 'cors';
      headers['Sec-Fetch-Site'] = sameOrigin || !opts.referer ? 'same-origin' : 'cross-site';
    } else {
      headers['Accept'] =
        'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8';
      headers['Upgrade-Insecure-Requests'] = '1';
      headers['Sec-Fetch-Dest'] = 'document';
      headers['Sec-Fetch-Mode'] = 'navigate';
      headers['Sec-Fetch-User'] = '?1';
      headers['Sec-Fetch-Site'] = !opts.referer ? 'none' : sameOrigin ? 'same-origin' : 'cross-site';
      if (opts.kind === 'form') {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
        headers['Origin'] = target.origin;
      }
    }

    if (opts.referer) headers['Referer'] = opts.referer;

    const cookie = this.jar.getCookieHeader(opts.url, this.now());
    if (cookie) headers['Cookie'] = cookie;

    return { ...headers, ...opts.extra };
  }

  /**
   * Store Set-Cookie header(s) received from url
   */
  storeCookies(url: string, setCookie: string | string[] | undefined): void {
    if (!setCookie || this.destroyed) return;
    const values = Array.isArray(setCookie) ? setCookie : [setCookie];
    const at = this.now();
    for (const value of values) {
      this.jar.setCookie(value, url, at);
    }
  }

  cookiesFor(url: string): StoredCookie[] {
    return this.jar.getCookies(url, this.now());
  }

  get cookieCount(): number {
    return this.jar.size;
  }

  /** Remember a token (e.g. CSRF) discovered by one strategy for later ones */
  setToken(name: string, value: string): void {
    if (this.destroyed) return;
    this.tokens.set(name, value);
  }

  getToken(name: string): string | undefined {
    return this.tokens.get(name);
  }

  /** @internal SessionManager bookkeeping */
  lease(): void {
    this.leaseCount++;
  }

  /** @internal */
  unlease(): void {
    if (this.leaseCount > 0) this.leaseCount--;
  }

  /**
   * @internal Swap identity after a block. Cookies and tokens belonged to the blocked
   * identity and are dropped with it.
   */
  replaceFingerprint(fingerprint: Fingerprint, proxy?: ProxyServer): void {
    this.currentFingerprint = fingerprint;
    this.currentProxy = proxy;
    this.jar.clear();
    this.tokens.clear();
    this.rotationCount++;
  }

  /** @internal */
  bindProxy(proxy: ProxyServer | undefined): void {
    this.currentProxy = proxy;
  }

  /** @internal */
  destroy(): void {
    this.destroyed = true;
    this.jar.clear();
    this.tokens.clear();
  }
}
