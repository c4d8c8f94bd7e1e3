export { identify, candidateCarriers, createCarrierIdentifier } from './carrier-identifier.js';
export type { CarrierIdentifier } from './carrier-identifier.js';
export {
  createTrackingNumber,
  normalizeTrackingNumber,
  compactTrackingNumber,
  isValidTrackingNumber,
} from './tracking-number.js';
