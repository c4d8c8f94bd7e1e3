import type { CarrierProfile, IdentificationRule, StrategyStep } from '../types/carrier.js';
import type { CarrierTag } from '../types/tracking-number.js';
import type { EngineConfig, CarrierConfig } from './schema.js';

export interface CompiledCarriers {
  profiles: ReadonlyMap<CarrierTag, CarrierProfile>;
  /** Sorted by priority (desc), configuration order kept within a priority */
  rules: readonly IdentificationRule[];
}

function buildSteps(carrier: CarrierConfig, mirrors: EngineConfig['mirrors']): StrategyStep[] {
  const steps: StrategyStep[] = [];
  const seen = new Map<string, number>();

  const uniqueId = (base: string): string => {
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}-${count + 1}`;
  };

  for (const step of carrier.strategies) {
    if (step.kind === 'mirror-lookup' && !step.url) {
      for (const mirror of mirrors) {
        steps.push({
          id: uniqueId(step.id ?? `mirror:${mirror.id}`),
          kind: 'mirror-lookup',
          url: mirror.url,
          method: step.method,
          timeoutMs: step.timeoutMs,
        });
      }
      continue;
    }
    steps.push({
      id: uniqueId(step.id ?? step.kind),
      kind: step.kind,
      url: step.url,
      pageUrl: step.pageUrl,
      method: step.method,
      body: step.body,
      fieldName: step.fieldName,
      timeoutMs: step.timeoutMs,
    });
  }
  return steps;
}

/**
 * Turn validated configuration into frozen carrier profiles and compiled rules
 */
export function compileCarriers(config: EngineConfig): CompiledCarriers {
  const profiles = new Map<CarrierTag, CarrierProfile>();
  const ranked: Array<IdentificationRule & { order: number }> = [];

  for (const carrier of config.carriers) {
    if (profiles.has(carrier.carrier)) {
      throw new Error(`Duplicate carrier '${carrier.carrier}' in configuration`);
    }

    const profile: CarrierProfile = Object.freeze({
      carrier: carrier.carrier,
      displayName: carrier.displayName,
      baseUrls: Object.freeze([...carrier.baseUrls]),
      strategies: Object.freeze(buildSteps(carrier, config.mirrors).map((step) => Object.freeze(step))),
      blockKeywords: Object.freeze(carrier.blockKeywords.map((k) => k.toLowerCase())),
      mirrorSlug: carrier.mirrorSlug ?? carrier.carrier,
      statusAliases: Object.freeze({ ...carrier.statusAliases }),
      limits: Object.freeze({
        maxConcurrent: carrier.limits.maxConcurrent ?? config.batch.maxConcurrentPerCarrier,
        minIntervalMs: carrier.limits.minIntervalMs ?? config.batch.minIntervalMs,
      }),
    });
    profiles.set(carrier.carrier, profile);

    for (const rule of carrier.identification) {
      ranked.push({
        carrier: carrier.carrier,
        pattern: new RegExp(rule.pattern),
        confidence: rule.confidence,
        priority: rule.priority,
        order: ranked.length,
      });
    }
  }

  const rules = ranked
    .sort((a, b) => b.priority - a.priority || a.order - b.order)
    .map(({ order: _order, ...rule }) => Object.freeze(rule));

  return { profiles, rules: Object.freeze(rules) };
}
