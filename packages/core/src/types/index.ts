export * from './tracking-number.js';
export * from './tracking.js';
export * from './attempt.js';
export * from './carrier.js';
export * from './batch.js';
