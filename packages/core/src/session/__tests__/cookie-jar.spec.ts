import { describe, it, expect } from 'vitest';
import { CookieJar } from '../cookie-jar.js';

const NOW = Date.UTC(2024, 2, 14, 12, 0, 0);

describe('CookieJar', () => {
  it('scopes host-only cookies to their host', () => {
    const jar = new CookieJar();
    jar.setCookie('sid=abc; Path=/', 'https://www.carrier.test/track', NOW);

    expect(jar.getCookieHeader('https://www.carrier.test/other', NOW)).toBe('sid=abc');
    expect(jar.getCookieHeader('https://api.carrier.test/', NOW)).toBeUndefined();
  });

  it('shares domain cookies with subdomains', () => {
    const jar = new CookieJar();
    jar.setCookie('region=us; Domain=.carrier.test; Path=/', 'https://www.carrier.test/', NOW);

    expect(jar.getCookieHeader('https://api.carrier.test/v1', NOW)).toBe('region=us');
  });

  it('rejects a Domain the request host does not belong to', () => {
    const jar = new CookieJar();

    expect(jar.setCookie('x=1; Domain=elsewhere.test', 'https://www.carrier.test/', NOW)).toBe(false);
    expect(jar.size).toBe(0);
  });

  it('matches paths on segment boundaries and sends longer paths first', () => {
    const jar = new CookieJar();
    jar.setCookie('a=1; Path=/', 'https://carrier.test/', NOW);
    jar.setCookie('b=2; Path=/track', 'https://carrier.test/', NOW);

    expect(jar.getCookieHeader('https://carrier.test/track/123', NOW)).toBe('b=2; a=1');
    expect(jar.getCookieHeader('https://carrier.test/tracking', NOW)).toBe('a=1');
  });

  it('defaults the path to the request directory', () => {
    const jar = new CookieJar();
    jar.setCookie('step=2', 'https://carrier.test/forms/track.aspx', NOW);

    expect(jar.getCookies('https://carrier.test/forms/result', NOW)[0].path).toBe('/forms');
    expect(jar.getCookieHeader('https://carrier.test/', NOW)).toBeUndefined();
  });

  it('expires cookies, with Max-Age taking precedence over Expires', () => {
    const jar = new CookieJar();
    jar.setCookie('short=1; Max-Age=60; Expires=Wed, 01 Jan 2031 00:00:00 GMT', 'https://carrier.test/', NOW);

    expect(jar.getCookieHeader('https://carrier.test/', NOW + 59_000)).toBe('short=1');
    expect(jar.getCookieHeader('https://carrier.test/', NOW + 61_000)).toBeUndefined();
  });

  it('deletes a cookie set again with a past expiry', () => {
    const jar = new CookieJar();
    jar.setCookie('sid=abc; Path=/', 'https://carrier.test/', NOW);

    expect(jar.setCookie('sid=; Path=/; Max-Age=0', 'https://carrier.test/', NOW)).toBe(false);
    expect(jar.size).toBe(0);
  });

  it('keeps secure cookies off plain http', () => {
    const jar = new CookieJar();
    jar.setCookie('token=t; Secure; Path=/', 'https://carrier.test/', NOW);

    expect(jar.getCookieHeader('http://carrier.test/', NOW)).toBeUndefined();
    expect(jar.getCookieHeader('https://carrier.test/', NOW)).toBe('token=t');
  });
});
