import type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import { RetrievalError } from '../errors/index.js';
import { fetchPage } from './http-fetch.js';
import { resolveOptions, type StrategyOptions } from './options.js';
import { expandBody, expandTemplate } from './template.js';

/**
 * Plain document request to the carrier's tracking URL
 */
export function createDirectFetchStrategy(opts: StrategyOptions = {}): RetrievalStrategy {
  const { timeoutMs, passThrough } = resolveOptions('direct-fetch', opts);

  return {
    kind: 'direct-fetch',
    defaultTimeoutMs: timeoutMs,

    async execute(request: StrategyRequest): Promise<RetrievedPayload> {
      const { step, trackingNumber, profile } = request;
      if (!step.url) {
        throw new RetrievalError(`Step '${step.id}' has no url`, 'NotConfigured', { strategyId: step.id });
      }
      const url = expandTemplate(step.url, trackingNumber, profile);

      if (step.method === 'POST') {
        const form = new URLSearchParams(expandBody(step.body ?? {}, trackingNumber, profile));
        return fetchPage(
          request,
          { method: 'POST', url, kind: 'form', referer: profile.baseUrls[0], data: form.toString() },
          passThrough
        );
      }
      return fetchPage(request, { method: 'GET', url, kind: 'document' }, passThrough);
    },
  };
}
