import type { PageRenderer } from '../interfaces/renderer.js';
import type { StrategyKind } from '../types/attempt.js';
import { DEFAULT_PASS_THROUGH, type PassThroughPolicy } from './http-fetch.js';

export const DEFAULT_STRATEGY_TIMEOUTS: Readonly<Record<StrategyKind, number>> = {
  'direct-fetch': 8_000,
  'form-submit': 10_000,
  'json-api': 8_000,
  'challenge-bypass': 12_000,
  'mirror-lookup': 10_000,
  render: 15_000,
};

export interface StrategyOptions {
  timeoutMs?: number;
  passThrough?: PassThroughPolicy;
}

export interface RenderStrategyOptions extends StrategyOptions {
  /** Without one, render steps are skipped */
  renderer?: PageRenderer;
}

export function resolveOptions(
  kind: StrategyKind,
  opts: StrategyOptions
): { timeoutMs: number; passThrough: PassThroughPolicy } {
  return {
    timeoutMs: opts.timeoutMs ?? DEFAULT_STRATEGY_TIMEOUTS[kind],
    passThrough: opts.passThrough ?? DEFAULT_PASS_THROUGH,
  };
}
