/**
 * Browser identities presented to carrier sites
 *
 * Each entry is internally consistent: the user agent, client hints and TLS profile
 * all describe the same browser build.
 */

export interface Fingerprint {
  id: string;
  platform: 'desktop' | 'mobile';
  os: 'Windows' | 'macOS' | 'iOS' | 'Android';
  engine: 'Blink' | 'Gecko' | 'WebKit';
  /** Name of the TLS client hello this browser would send */
  tlsProfile: string;
  userAgent: string;
  acceptLanguage: string;
  /** Only Chromium-based browsers send client hints */
  clientHints?: {
    'sec-ch-ua': string;
    'sec-ch-ua-mobile': string;
    'sec-ch-ua-platform': string;
  };
}

export const FINGERPRINT_CATALOG: readonly Fingerprint[] = Object.freeze([
  {
    id: 'chrome-windows',
    platform: 'desktop',
    os: 'Windows',
    engine: 'Blink',
    tlsProfile: 'chrome_124',
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    acceptLanguage: 'en-US,en;q=0.9',
    clientHints: {
      'sec-ch-ua': '"Chromium";v="124", "Google Chrome";v="124", "Not-A.Brand";v="99"',
      'sec-ch-ua-mobile': '?0',
      'sec-ch-ua-platform': '"Windows"',
    },
  },
  {
    id: 'chrome-macos',
    platform: 'desktop',
    os: 'macOS',
    engine: 'Blink',
    tlsProfile: 'chrome_124',
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    acceptLanguage: 'en-US,en;q=0.9',
    clientHints: {
      'sec-ch-ua': '"Chromium";v="124", "Google Chrome";v="124", "Not-A.Brand";v="99"',
      'sec-ch-ua-mobile': '?0',
      'sec-ch-ua-platform': '"macOS"',
    },
  },
  {
    id: 'firefox-windows',
    platform: 'desktop',
    os: 'Windows',
    engine: 'Gecko',
    tlsProfile: 'firefox_125',
    userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
    acceptLanguage: 'en-US,en;q=0.5',
  },
  {
    id: 'safari-macos',
    platform: 'desktop',
    os: 'macOS',
    engine: 'WebKit',
    tlsProfile: 'safari_17',
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
    acceptLanguage: 'en-US,en;q=0.9',
  },
  {
    id: 'edge-windows',
    platform: 'desktop',
    os: 'Windows',
    engine: 'Blink',
    tlsProfile: 'chrome_124',
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
    acceptLanguage: 'en-US,en;q=0.9',
    clientHints: {
      'sec-ch-ua': '"Chromium";v="124", "Microsoft Edge";v="124", "Not-A.Brand";v="99"',
      'sec-ch-ua-mobile': '?0',
      'sec-ch-ua-platform': '"Windows"',
    },
  },
  {
    id: 'safari-ios',
    platform: 'mobile',
    os: 'iOS',
    engine: 'WebKit',
    tlsProfile: 'safari_ios_17',
    userAgent:
      'Mozilla/5.0 (iPhone; CPU iPhone OS 17_4 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Mobile/15E148 Safari/604.1',
    acceptLanguage: 'en-US,en;q=0.9',
  },
  {
    id: 'chrome-android',
    platform: 'mobile',
    os: 'Android',
    engine: 'Blink',
    tlsProfile: 'chrome_124',
    userAgent:
      'Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Mobile Safari/537.36',
    acceptLanguage: 'en-US,en;q=0.9',
    clientHints: {
      'sec-ch-ua': '"Chromium";v="124", "Google Chrome";v="124", "Not-A.Brand";v="99"',
      'sec-ch-ua-mobile': '?1',
      'sec-ch-ua-platform': '"Android"',
    },
  },
]);
