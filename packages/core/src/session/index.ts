export { SessionManager } from './session-manager.js';
export type { SessionManagerOptions, SessionPoolStats } from './session-manager.js';
export { Session } from './session.js';
export type { HeaderOptions, RequestKind } from './session.js';
export { CookieJar } from './cookie-jar.js';
export type { StoredCookie } from './cookie-jar.js';
export { FINGERPRINT_CATALOG } from './fingerprint-catalog.js';
export type { Fingerprint } from './fingerprint-catalog.js';
export { ProxyPool, parseProxyUrl, isProxyUrl } from './proxy-pool.js';
export type { ProxyServer, ProxyPoolOptions, ProxyStats } from './proxy-pool.js';
