/**
 * Minimal RFC 6265 cookie store: domain and path matching, expiry, secure flag
 */

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  /** Set when the cookie had no Domain attribute */
  hostOnly: boolean;
  path: string;
  secure: boolean;
  expiresAt?: number;
}

function defaultPath(pathname: string): string {
  const idx = pathname.lastIndexOf('/');
  return idx <= 0 ? '/' : pathname.slice(0, idx);
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith('/') || requestPath.charAt(cookiePath.length) === '/';
}

export class CookieJar {
  private cookies: StoredCookie[] = [];

  get size(): number {
    return this.cookies.length;
  }

  /**
   * Store one Set-Cookie header received from requestUrl.
   * Returns false when the cookie was rejected or deleted.
   */
  setCookie(header: string, requestUrl: string, now: number = Date.now()): boolean {
    const url = new URL(requestUrl);
    const host = url.hostname.toLowerCase();
    const [pair, ...attributes] = header.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) return false;

    const cookie: StoredCookie = {
      name: pair.slice(0, eq).trim(),
      value: pair.slice(eq + 1).trim(),
      domain: host,
      hostOnly: true,
      path: defaultPath(url.pathname),
      secure: false,
    };

    let maxAge: number | undefined;
    for (const attribute of attributes) {
      const [rawKey, ...rest] = attribute.split('=');
      const key = rawKey.trim().toLowerCase();
      const value = rest.join('=').trim();
      if (key === 'domain' && value) {
        const domain = value.replace(/^\./, '').toLowerCase();
        if (!domainMatches(host, domain)) return false;
        cookie.domain = domain;
        cookie.hostOnly = false;
      } else if (key === 'path' && value.startsWith('/')) {
        cookie.path = value;
      } else if (key === 'secure') {
        cookie.secure = true;
      } else if (key === 'max-age') {
        const seconds = Number(value);
        if (Number.isFinite(seconds)) maxAge = seconds;
      } else if (key === 'expires') {
        const at = Date.parse(value);
        if (!Number.isNaN(at)) cookie.expiresAt = at;
      }
    }
    // Max-Age wins over Expires
    if (maxAge !== undefined) cookie.expiresAt = now + maxAge * 1000;

    this.cookies = this.cookies.filter(
      (c) => !(c.name === cookie.name && c.domain === cookie.domain && c.path === cookie.path)
    );
    if (cookie.expiresAt !== undefined && cookie.expiresAt <= now) return false;
    this.cookies.push(cookie);
    return true;
  }

  getCookies(requestUrl: string, now: number = Date.now()): StoredCookie[] {
    const url = new URL(requestUrl);
    const host = url.hostname.toLowerCase();
    this.cookies = this.cookies.filter((c) => c.expiresAt === undefined || c.expiresAt > now);
    return this.cookies
      .filter((c) => (c.hostOnly ? host === c.domain : domainMatches(host, c.domain)))
      .filter((c) => pathMatches(url.pathname || '/', c.path))
      .filter((c) => !c.secure || url.protocol === 'https:')
      // longer paths first
      .sort((a, b) => b.path.length - a.path.length);
  }

  getCookieHeader(requestUrl: string, now: number = Date.now()): string | undefined {
    const cookies = this.getCookies(requestUrl, now);
    if (cookies.length === 0) return undefined;
    return cookies.map((c) => `${c.name}=${c.value}`).join('; ');
  }

  clear(): void {
    this.cookies = [];
  }
}
