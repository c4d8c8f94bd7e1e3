import type { PageRenderer } from '../interfaces/renderer.js';
import type { RetrievalStrategy } from '../interfaces/strategy.js';
import type { StrategyKind } from '../types/attempt.js';
import { createChallengeBypassStrategy } from './challenge-bypass.js';
import { createDirectFetchStrategy } from './direct-fetch.js';
import { createFormSubmitStrategy } from './form-submit.js';
import type { PassThroughPolicy } from './http-fetch.js';
import { createJsonApiStrategy } from './json-api.js';
import { createMirrorLookupStrategy } from './mirror-lookup.js';
import { createRenderStrategy } from './render.js';

export type StrategyRegistry = Readonly<Record<StrategyKind, RetrievalStrategy>>;

export interface StrategyRegistryOptions {
  timeouts?: Partial<Record<StrategyKind, number>>;
  passThrough?: PassThroughPolicy;
  renderer?: PageRenderer;
}

/**
 * One strategy per kind, sharing timeouts and the pass-through policy
 */
export function createStrategyRegistry(opts: StrategyRegistryOptions = {}): StrategyRegistry {
  const { timeouts = {}, passThrough } = opts;
  return Object.freeze({
    'direct-fetch': createDirectFetchStrategy({ timeoutMs: timeouts['direct-fetch'], passThrough }),
    'form-submit': createFormSubmitStrategy({ timeoutMs: timeouts['form-submit'], passThrough }),
    'json-api': createJsonApiStrategy({ timeoutMs: timeouts['json-api'], passThrough }),
    'challenge-bypass': createChallengeBypassStrategy({ timeoutMs: timeouts['challenge-bypass'], passThrough }),
    'mirror-lookup': createMirrorLookupStrategy({ timeoutMs: timeouts['mirror-lookup'], passThrough }),
    render: createRenderStrategy({ timeoutMs: timeouts.render, renderer: opts.renderer }),
  });
}
