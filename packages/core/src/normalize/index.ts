export * from './result-normalizer.js';
