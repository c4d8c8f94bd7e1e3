import puppeteer, { type Browser } from 'puppeteer-core';
import type { Logger } from '../interfaces/logger.js';
import type { PageRenderer, RenderedPage, RenderRequest } from '../interfaces/renderer.js';
import { RetrievalError } from '../errors/index.js';

export interface PuppeteerRendererOptions {
  /** Chrome or Chromium binary; puppeteer-core never downloads one */
  executablePath: string;
  headless?: boolean;
  args?: string[];
  logger?: Logger;
}

const BASE_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--no-first-run',
  '--no-zygote',
  '--disable-gpu',
];

/**
 * PageRenderer on a shared headless browser, launched on first use.
 * Every render gets its own page, closed afterwards or on abort. A proxied
 * render also gets its own browser context.
 */
export class PuppeteerRenderer implements PageRenderer {
  private browserPromise: Promise<Browser> | null = null;

  constructor(private readonly opts: PuppeteerRendererOptions) {}

  private browser(): Promise<Browser> {
    if (!this.browserPromise) {
      this.opts.logger?.debug('launching browser', { executablePath: this.opts.executablePath });
      const launching = puppeteer.launch({
        executablePath: this.opts.executablePath,
        headless: this.opts.headless ?? true,
        args: [...BASE_ARGS, ...(this.opts.args ?? [])],
        defaultViewport: { width: 1366, height: 768 },
      });
      this.browserPromise = launching;
      launching.then(
        (browser) => {
          browser.on('disconnected', () => {
            this.browserPromise = null;
          });
        },
        () => {
          this.browserPromise = null;
        }
      );
    }
    return this.browserPromise;
  }

  async render(request: RenderRequest): Promise<RenderedPage> {
    if (request.signal.aborted) throw request.signal.reason;

    const browser = await this.browser();
    const context = request.proxy
      ? await browser.createBrowserContext({
          proxyServer: `${request.proxy.protocol}://${request.proxy.host}:${request.proxy.port}`,
        })
      : undefined;
    const page = await (context ?? browser).newPage();
    const onAbort = () => {
      page.close().catch((error: unknown) => {
        this.opts.logger?.warn('failed to close aborted page', { error: String(error) });
      });
    };
    request.signal.addEventListener('abort', onAbort, { once: true });

    try {
      if (request.proxy?.auth) await page.authenticate(request.proxy.auth);
      await page.setUserAgent(request.userAgent);
      await page.setExtraHTTPHeaders(request.headers);
      if (request.cookies.length > 0) await page.setCookie(...request.cookies);

      const response = await page.goto(request.url, { waitUntil: 'networkidle2', timeout: request.timeoutMs });
      if (!response) {
        throw new RetrievalError(`No response rendering ${request.url}`, 'NetworkError');
      }

      const cookies = await page.cookies();
      return {
        html: await page.content(),
        status: response.status(),
        url: page.url(),
        cookies: cookies.map((c) => ({ name: c.name, value: c.value, domain: c.domain, path: c.path })),
      };
    } finally {
      request.signal.removeEventListener('abort', onAbort);
      if (!page.isClosed()) await page.close();
      if (context) await context.close();
    }
  }

  async close(): Promise<void> {
    const pending = this.browserPromise;
    this.browserPromise = null;
    if (!pending) return;
    // a failed launch already surfaced through render()
    const browser = await pending.catch(() => null);
    if (browser) await browser.close();
  }
}

export function createPuppeteerRenderer(opts: PuppeteerRendererOptions): PageRenderer {
  return new PuppeteerRenderer(opts);
}
