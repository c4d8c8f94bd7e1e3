export { BatchOrchestrator, summarizeBatch } from './orchestrator.js';
export type { BatchPlan, BatchPlanner, BatchOptions, BatchOrchestratorOptions } from './orchestrator.js';
export { CarrierLimiter } from './carrier-limiter.js';
export type { LaneStats } from './carrier-limiter.js';
