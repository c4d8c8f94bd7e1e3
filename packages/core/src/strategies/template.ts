import type { CarrierProfile } from '../types/carrier.js';
import type { TrackingNumber } from '../types/tracking-number.js';

const PLACEHOLDER = /\{(trackingNumber|rawTrackingNumber|carrierSlug)\}/g;

/**
 * Fill {trackingNumber}, {rawTrackingNumber} and {carrierSlug}.
 * {trackingNumber} is the compact form; {rawTrackingNumber} keeps separators.
 */
export function expandTemplate(
  template: string,
  trackingNumber: TrackingNumber,
  profile: Pick<CarrierProfile, 'mirrorSlug'>,
  encode = true
): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value =
      name === 'trackingNumber'
        ? trackingNumber.compact
        : name === 'rawTrackingNumber'
          ? trackingNumber.normalized
          : profile.mirrorSlug;
    return encode ? encodeURIComponent(value) : value;
  });
}

export function expandBody(
  body: Readonly<Record<string, string>>,
  trackingNumber: TrackingNumber,
  profile: Pick<CarrierProfile, 'mirrorSlug'>
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    out[key] = expandTemplate(value, trackingNumber, profile, false);
  }
  return out;
}
