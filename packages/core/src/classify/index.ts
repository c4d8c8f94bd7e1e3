export { classify, analyzeContent, countScriptMarkers, DEFAULT_CLASSIFIER_THRESHOLDS } from './content-classifier.js';
export type { ClassifierThresholds, ContentAnalysis, BlockingMechanism } from './content-classifier.js';
