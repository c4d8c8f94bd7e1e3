import type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import type { RenderCookie } from '../interfaces/renderer.js';
import { NotImplementedError, RetrievalError } from '../errors/index.js';
import { abortError } from './http-fetch.js';
import { resolveOptions, type RenderStrategyOptions } from './options.js';
import { expandTemplate } from './template.js';

function toSetCookie(cookie: RenderCookie): string {
  return `${cookie.name}=${cookie.value}; Domain=${cookie.domain.replace(/^\./, '')}; Path=${cookie.path || '/'}`;
}

/**
 * Full browser render through the configured PageRenderer. The session's identity and
 * cookies go in; cookies set by the page come back into the session.
 */
export function createRenderStrategy(opts: RenderStrategyOptions = {}): RetrievalStrategy {
  const { timeoutMs } = resolveOptions('render', opts);
  const renderer = opts.renderer;

  return {
    kind: 'render',
    defaultTimeoutMs: timeoutMs,

    async execute(request: StrategyRequest): Promise<RetrievedPayload> {
      const { step, trackingNumber, profile, session, signal } = request;
      if (!renderer) throw new NotImplementedError('renderer', step.id);

      const url = expandTemplate(step.url ?? step.pageUrl ?? profile.baseUrls[0], trackingNumber, profile);
      const headers = session.buildHeaders({ kind: 'document', url });
      const userAgent = headers['User-Agent'];
      // the browser sets these itself
      delete headers['User-Agent'];
      delete headers['Cookie'];
      const cookies = session.cookiesFor(url).map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
      }));

      try {
        const page = await renderer.render({
          url,
          userAgent,
          headers,
          cookies,
          timeoutMs: request.timeoutMs,
          signal,
          ...(session.proxy && { proxy: session.proxy.endpoint }),
        });
        session.storeCookies(page.url, page.cookies.map(toSetCookie));
        return {
          body: page.html,
          status: page.status,
          url: page.url,
          contentType: 'text/html',
          headers: {},
        };
      } catch (error) {
        if (signal.aborted) throw abortError(signal, step.id);
        if (error instanceof RetrievalError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new RetrievalError(`Render failed: ${message}`, 'NetworkError', { strategyId: step.id, raw: error });
      }
    },
  };
}
