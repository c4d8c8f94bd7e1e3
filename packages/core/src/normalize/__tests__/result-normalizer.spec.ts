import { describe, it, expect } from 'vitest';
import { discountConfidence, exhausted, mapStatus, normalize, rotationsIn } from '../result-normalizer.js';
import { createTrackingNumber } from '../../identify/tracking-number.js';
import type { RawExtraction } from '../../interfaces/parser.js';
import type { StrategyAttempt } from '../../types/attempt.js';

const tn = createTrackingNumber('pro: 0123-4567');

function attempt(overrides: Partial<StrategyAttempt>): StrategyAttempt {
  return {
    strategyId: 'direct-fetch',
    kind: 'direct-fetch',
    startedAt: new Date('2024-03-14T10:00:00Z'),
    finishedAt: new Date('2024-03-14T10:00:01Z'),
    payloadSize: 0,
    outcome: 'NoData',
    fingerprintId: 'chrome-windows',
    ...overrides,
  };
}

const extraction: RawExtraction = {
  parserId: 'tabular',
  confidence: 0.8,
  statusText: 'Out for Delivery',
  location: 'Columbus, OH',
  description: 'On truck for delivery',
  timestamp: new Date('2024-03-14T07:05:00Z'),
};

describe('mapStatus', () => {
  it('matches the vocabulary in order, case-insensitively', () => {
    expect(mapStatus('DELIVERED')).toBe('Delivered');
    expect(mapStatus('Shipment is Out For Delivery')).toBe('OutForDelivery');
    expect(mapStatus('in transit to destination')).toBe('InTransit');
    expect(mapStatus('Picked up at shipper')).toBe('PickedUp');
    expect(mapStatus('Delivery exception: closed')).toBe('Exception');
    expect(mapStatus('Delivered - exception cleared')).toBe('Delivered');
  });

  it('treats separators as spaces', () => {
    expect(mapStatus('IN_TRANSIT')).toBe('InTransit');
    expect(mapStatus('out-for-delivery')).toBe('OutForDelivery');
  });

  it('applies carrier aliases first', () => {
    expect(mapStatus('DEL', { DEL: 'Delivered' })).toBe('Delivered');
    expect(mapStatus(' ofd ', { OFD: 'Out for Delivery' })).toBe('OutForDelivery');
  });

  it('defaults to Unknown', () => {
    expect(mapStatus('Awaiting information')).toBe('Unknown');
  });
});

describe('discountConfidence', () => {
  it('leaves a single rotation undiscounted', () => {
    expect(discountConfidence(0.8, 0)).toBe(0.8);
    expect(discountConfidence(0.8, 1)).toBe(0.8);
  });

  it('discounts each rotation beyond the first, down to a floor', () => {
    expect(discountConfidence(0.8, 2)).toBe(0.72);
    expect(discountConfidence(0.8, 3)).toBe(0.64);
    expect(discountConfidence(0.5, 20)).toBe(0.1);
  });
});

describe('normalize', () => {
  it('builds a frozen success with provenance', () => {
    const attempts = [
      attempt({ outcome: 'Blocked', detail: 'anti-bot block detected' }),
      attempt({ strategyId: 'render', kind: 'render', outcome: 'Success', parserId: 'tabular' }),
    ];
    const result = normalize(extraction, attempts, {
      trackingNumber: tn,
      carrier: 'estes',
      step: { id: 'render', kind: 'render' },
    });

    expect(result).toMatchObject({
      success: true,
      trackingNumber: '0123-4567',
      carrier: 'estes',
      status: 'OutForDelivery',
      location: 'Columbus, OH',
      lastEventDescription: 'On truck for delivery',
      provenance: { strategyId: 'render', strategyKind: 'render', parserId: 'tabular' },
      confidence: 0.8,
    });
    expect(result.attempts).toHaveLength(2);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.attempts[0])).toBe(true);
  });

  it('discounts confidence when more than one rotation was needed', () => {
    const attempts = [
      attempt({ outcome: 'Blocked' }),
      attempt({ outcome: 'Blocked' }),
      attempt({ outcome: 'Success' }),
    ];
    expect(rotationsIn(attempts)).toBe(2);
    const result = normalize(extraction, attempts, {
      trackingNumber: tn,
      carrier: 'estes',
      step: { id: 'direct-fetch', kind: 'direct-fetch' },
    });
    expect(result.confidence).toBe(0.72);
  });
});

describe('exhausted', () => {
  it('summarises every attempt in the reason', () => {
    const result = exhausted(tn, 'estes', [
      attempt({ outcome: 'NoData', detail: 'script markup misclassified as content: bare script fragment of 48 bytes' }),
      attempt({ strategyId: 'mirror:parcelsapp', kind: 'mirror-lookup', outcome: 'Timeout', detail: 'Timed out after 10000ms' }),
    ]);

    expect(result.success).toBe(false);
    expect(result.status).toBe('Unknown');
    expect(result.confidence).toBe(0);
    expect(result.provenance).toBeNull();
    expect(result.errorKind).toBe('AllStrategiesExhausted');
    expect(result.reason).toBe(
      'All strategies exhausted (direct-fetch: script markup misclassified as content: bare script fragment of 48 bytes; mirror:parcelsapp: Timed out after 10000ms)'
    );
    expect(result.attemptedStrategies).toEqual(['direct-fetch', 'mirror:parcelsapp']);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('explains an empty ladder', () => {
    const result = exhausted('0123-4567', 'unknown', []);
    expect(result.reason).toBe("No retrieval strategies available for carrier 'unknown'");
    expect(result.attemptedStrategies).toEqual([]);
  });

  it('keeps an explicit reason and kind', () => {
    const result = exhausted(tn, 'estes', [], { reason: 'Request cancelled', errorKind: 'Cancelled' });
    expect(result.reason).toBe('Request cancelled');
    expect(result.errorKind).toBe('Cancelled');
  });
});
