import type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import { RetrievalError } from '../errors/index.js';
import { fetchPage } from './http-fetch.js';
import { resolveOptions, type StrategyOptions } from './options.js';
import { expandBody, expandTemplate } from './template.js';

export const CSRF_TOKEN = 'csrf';

/**
 * XHR-style call to a carrier's JSON endpoint. A CSRF token found by an earlier rung
 * is sent along.
 */
export function createJsonApiStrategy(opts: StrategyOptions = {}): RetrievalStrategy {
  const { timeoutMs, passThrough } = resolveOptions('json-api', opts);

  return {
    kind: 'json-api',
    defaultTimeoutMs: timeoutMs,

    async execute(request: StrategyRequest): Promise<RetrievedPayload> {
      const { step, trackingNumber, profile, session } = request;
      if (!step.url) {
        throw new RetrievalError(`Step '${step.id}' has no url`, 'NotConfigured', { strategyId: step.id });
      }

      const url = expandTemplate(step.url, trackingNumber, profile);
      const headers: Record<string, string> = {};
      const csrf = session.getToken(CSRF_TOKEN);
      if (csrf) headers['X-CSRF-Token'] = csrf;

      if (step.method === 'POST') {
        headers['Content-Type'] = 'application/json';
        return fetchPage(
          request,
          {
            method: 'POST',
            url,
            kind: 'xhr',
            referer: profile.baseUrls[0],
            data: expandBody(step.body ?? { trackingNumber: '{trackingNumber}' }, trackingNumber, profile),
            headers,
          },
          passThrough
        );
      }
      return fetchPage(request, { method: 'GET', url, kind: 'xhr', referer: profile.baseUrls[0], headers }, passThrough);
    },
  };
}
