export * from './registry.js';
export * from './structured-data.js';
export * from './tabular.js';
export * from './pattern.js';
export * from './api-field.js';
export { isAcceptableExtraction, looksLikeCode } from './code-guard.js';
export { parseDateToken } from './tokens.js';
