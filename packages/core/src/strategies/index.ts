export * from './registry.js';
export * from './direct-fetch.js';
export * from './form-submit.js';
export * from './json-api.js';
export * from './challenge-bypass.js';
export * from './mirror-lookup.js';
export * from './render.js';
export { solveArithmetic, readChallenge, type ChallengeTokens } from './challenge.js';
export { expandTemplate, expandBody } from './template.js';
export { DEFAULT_PASS_THROUGH, type PassThroughPolicy } from './http-fetch.js';
export { DEFAULT_STRATEGY_TIMEOUTS, type StrategyOptions, type RenderStrategyOptions } from './options.js';
