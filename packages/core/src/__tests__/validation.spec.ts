import { describe, it, expect } from 'vitest';
import { safeValidateBatchRequest, safeValidateTrackRequest } from '../validation.js';

describe('request validation', () => {
  it('accepts a track request and lower-cases the carrier hint', () => {
    const result = safeValidateTrackRequest({ trackingNumber: '  PRO# 0628-143046 ', carrierHint: 'Estes' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ trackingNumber: 'PRO# 0628-143046', carrierHint: 'estes' });
    }
  });

  it('rejects an empty tracking number', () => {
    const result = safeValidateTrackRequest({ trackingNumber: '   ' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['trackingNumber']);
      expect(result.error.issues[0].message).toBe('trackingNumber must not be empty');
    }
  });

  it('rejects a carrier hint that is not an identifier', () => {
    expect(safeValidateTrackRequest({ trackingNumber: '0628143046', carrierHint: 'r+l' }).success).toBe(false);
  });

  it('requires at least one tracking number in a batch', () => {
    const result = safeValidateBatchRequest({ trackingNumbers: [] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('trackingNumbers must contain at least one entry');
    }
  });

  it('accepts a batch request', () => {
    const result = safeValidateBatchRequest({ trackingNumbers: ['0628143046', 'I123456789'] });

    expect(result.success).toBe(true);
  });
});
