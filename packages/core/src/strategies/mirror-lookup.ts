import type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import { RetrievalError } from '../errors/index.js';
import { fetchPage } from './http-fetch.js';
import { resolveOptions, type StrategyOptions } from './options.js';
import { expandTemplate } from './template.js';

/**
 * Third-party aggregator page. The carrier's own anti-bot stack is not involved, so this
 * rung often succeeds where the carrier's site blocks.
 */
export function createMirrorLookupStrategy(opts: StrategyOptions = {}): RetrievalStrategy {
  const { timeoutMs, passThrough } = resolveOptions('mirror-lookup', opts);

  return {
    kind: 'mirror-lookup',
    defaultTimeoutMs: timeoutMs,

    async execute(request: StrategyRequest): Promise<RetrievedPayload> {
      const { step, trackingNumber, profile } = request;
      if (!step.url) {
        throw new RetrievalError('No mirror configured for this step', 'NotConfigured', { strategyId: step.id });
      }
      const url = expandTemplate(step.url, trackingNumber, profile);
      return fetchPage(request, { method: 'GET', url, kind: 'document' }, passThrough);
    },
  };
}
