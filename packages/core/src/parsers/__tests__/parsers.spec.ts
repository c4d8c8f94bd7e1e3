import { describe, it, expect, vi } from 'vitest';
import {
  apiFieldParser,
  extract,
  isAcceptableExtraction,
  looksLikeCode,
  parseDateToken,
  patternParser,
  structuredDataParser,
  tabularParser,
} from '../index.js';
import { createTrackingNumber } from '../../identify/tracking-number.js';
import type { ExtractionParser } from '../../interfaces/parser.js';
import type { Logger } from '../../interfaces/logger.js';
import type { RetrievedPayload } from '../../interfaces/strategy.js';

const tn = createTrackingNumber('1234567890');

function html(body: string, head = ''): RetrievedPayload {
  return {
    body: `<html><head>${head}</head><body>${body}</body></html>`,
    status: 200,
    url: 'https://carrier.example/track',
    contentType: 'text/html',
    headers: {},
  };
}

function json(value: unknown): RetrievedPayload {
  return {
    body: JSON.stringify(value),
    status: 200,
    url: 'https://carrier.example/api/track',
    contentType: 'application/json',
    headers: {},
  };
}

describe('parseDateToken', () => {
  it('reads US dates as UTC with two-digit years in the 2000s', () => {
    expect(parseDateToken('03/14/24')?.toISOString()).toBe('2024-03-14T00:00:00.000Z');
    expect(parseDateToken('03/14/2024 2:15 PM')?.toISOString()).toBe('2024-03-14T14:15:00.000Z');
  });

  it('reads ISO and month-name dates', () => {
    expect(parseDateToken('2024-03-14 10:05')?.toISOString()).toBe('2024-03-14T10:05:00.000Z');
    expect(parseDateToken('Mar 14, 2024 12:30 AM')?.toISOString()).toBe('2024-03-14T00:30:00.000Z');
  });

  it('rejects impossible dates', () => {
    expect(parseDateToken('02/31/2024')).toBeNull();
    expect(parseDateToken('13/01/2024')).toBeNull();
  });
});

describe('code guard', () => {
  it('flags script text', () => {
    expect(looksLikeCode('function(){gtm.js}')).toBe(true);
    expect(looksLikeCode('var x = 1')).toBe(true);
    expect(looksLikeCode('document.getElementById')).toBe(true);
  });

  it('accepts ordinary statuses and places', () => {
    expect(looksLikeCode('Out for Delivery')).toBe(false);
    expect(looksLikeCode('Columbus, OH')).toBe(false);
  });

  it('rejects extractions whose status reads like code', () => {
    expect(
      isAcceptableExtraction({
        parserId: 'pattern',
        confidence: 0.5,
        statusText: 'window.dataLayer=[]',
        location: '',
        description: '',
        timestamp: null,
      })
    ).toBe(false);
  });
});

describe('tabularParser', () => {
  it('reads status, date and location from a single cell', () => {
    const result = tabularParser.tryExtract(
      html('<table><tr><td>Delivered 03/14/2024 Columbus, OH</td></tr><tr><td>In Transit 03/12/2024 Dayton, OH</td></tr></table>'),
      tn
    );
    expect(result).toEqual({
      parserId: 'tabular',
      confidence: 0.8,
      statusText: 'Delivered',
      location: 'Columbus, OH',
      description: 'Delivered',
      timestamp: new Date('2024-03-14T00:00:00.000Z'),
    });
  });

  it('reads the same fields from separate cells', () => {
    const result = tabularParser.tryExtract(
      html('<table><tr><th>Date</th><th>Status</th><th>Location</th></tr><tr><td>03/14/2024 2:15 PM</td><td>Delivered</td><td>Columbus, OH</td></tr></table>'),
      tn
    );
    expect(result?.statusText).toBe('Delivered');
    expect(result?.location).toBe('Columbus, OH');
    expect(result?.timestamp?.toISOString()).toBe('2024-03-14T14:15:00.000Z');
  });

  it('prefers the later row when dates tie', () => {
    const result = tabularParser.tryExtract(
      html('<ul><li>In Transit 03/14/2024 Dayton, OH</li><li>Out for Delivery 03/14/2024 Columbus, OH</li></ul>'),
      tn
    );
    expect(result?.statusText).toBe('Out for Delivery');
    expect(result?.location).toBe('Columbus, OH');
  });

  it('skips rows that carry script text', () => {
    const result = tabularParser.tryExtract(
      html('<ul><li>Delivered 03/14/2024 function(){gtm.js}</li></ul>'),
      tn
    );
    expect(result).toBeNull();
  });

  it('needs a date on the row', () => {
    expect(tabularParser.tryExtract(html('<ul><li>Delivered</li></ul>'), tn)).toBeNull();
  });

  it('reads a status phrase split across two cells', () => {
    const result = tabularParser.tryExtract(
      html('<table><tr><td>In</td><td>Transit</td><td>03/14/2024</td><td>Columbus, OH</td></tr></table>'),
      tn
    );
    expect(result).toEqual({
      parserId: 'tabular',
      confidence: 0.8,
      statusText: 'In Transit',
      location: 'Columbus, OH',
      description: 'In Transit',
      timestamp: new Date('2024-03-14T00:00:00.000Z'),
    });
  });
});

describe('structuredDataParser', () => {
  it('maps a JSON-LD ParcelDelivery', () => {
    const ld = {
      '@context': 'https://schema.org',
      '@type': 'ParcelDelivery',
      trackingNumber: '1234567890',
      deliveryStatus: {
        '@type': 'DeliveryEvent',
        name: 'In Transit',
        description: 'Departed terminal',
        startDate: '2024-03-12T08:30:00Z',
        location: { '@type': 'Place', address: { addressLocality: 'Dayton', addressRegion: 'OH' } },
      },
    };
    const result = structuredDataParser.tryExtract(
      html('', `<script type="application/ld+json">${JSON.stringify(ld)}</script>`),
      tn
    );
    expect(result).toEqual({
      parserId: 'structured-data',
      confidence: 0.95,
      statusText: 'In Transit',
      location: 'Dayton, OH',
      description: 'Departed terminal',
      timestamp: new Date('2024-03-12T08:30:00Z'),
    });
  });

  it('maps schema.org order status members', () => {
    const ld = {
      '@type': 'ParcelDelivery',
      deliveryStatus: 'http://schema.org/OrderDelivered',
      deliveryAddress: { addressLocality: 'Columbus', addressRegion: 'OH' },
    };
    const result = structuredDataParser.tryExtract(
      html('', `<script type="application/ld+json">${JSON.stringify(ld)}</script>`),
      tn
    );
    expect(result?.statusText).toBe('Delivered');
    expect(result?.location).toBe('Columbus, OH');
  });

  it('reads window state assignments', () => {
    const state = {
      shipment: {
        proNumber: '1234567890',
        currentStatus: 'Out for Delivery',
        lastLocation: { city: 'Columbus', state: 'OH' },
        eventDate: '2024-03-14T07:05:00Z',
      },
    };
    const result = structuredDataParser.tryExtract(
      html(`<script>window.__TRACKING_STATE__ = ${JSON.stringify(state)}; initApp();</script>`),
      tn
    );
    expect(result?.statusText).toBe('Out for Delivery');
    expect(result?.location).toBe('Columbus, OH');
    expect(result?.timestamp?.toISOString()).toBe('2024-03-14T07:05:00.000Z');
  });

  it('ignores state for another shipment', () => {
    const state = { proNumber: '9999999', status: 'Delivered', location: 'Columbus, OH' };
    const result = structuredDataParser.tryExtract(
      html(`<script type="application/json">${JSON.stringify(state)}</script>`),
      tn
    );
    expect(result).toBeNull();
  });
});

describe('patternParser', () => {
  it('reads labelled fields', () => {
    const result = patternParser.tryExtract(
      html('<div>Shipment Details</div><div>Status: Delivered</div><div>Location: Fort Wayne, IN</div><div>Delivery Date: 03/14/2024</div>'),
      tn
    );
    expect(result).toEqual({
      parserId: 'pattern',
      confidence: 0.5,
      statusText: 'Delivered',
      location: 'Fort Wayne, IN',
      description: 'Delivered',
      timestamp: new Date('2024-03-14T00:00:00.000Z'),
    });
  });

  it('finds status, date and place close together in prose', () => {
    const result = patternParser.tryExtract(
      html('<p>Your shipment was delivered on March 14, 2024 at 2:15 PM in Columbus, OH.</p>'),
      tn
    );
    expect(result?.statusText).toBe('delivered');
    expect(result?.location).toBe('Columbus, OH');
    expect(result?.timestamp?.toISOString()).toBe('2024-03-14T00:00:00.000Z');
  });

  it('leaves JSON bodies alone', () => {
    expect(patternParser.tryExtract(json({ status: 'Delivered', location: 'Columbus, OH' }), tn)).toBeNull();
  });
});

describe('apiFieldParser', () => {
  it('finds the first record with a status and a location', () => {
    const result = apiFieldParser.tryExtract(
      json({
        data: {
          shipments: [
            {
              proNumber: '1234567890',
              trackingStatus: 'IN_TRANSIT',
              currentLocation: { city: 'Dayton', state: 'OH' },
              statusDate: '2024-03-12T08:30:00Z',
              statusDetail: 'Departed terminal',
            },
          ],
        },
      }),
      tn
    );
    expect(result).toEqual({
      parserId: 'api-field',
      confidence: 0.8,
      statusText: 'IN_TRANSIT',
      location: 'Dayton, OH',
      description: 'Departed terminal',
      timestamp: new Date('2024-03-12T08:30:00Z'),
    });
  });

  it('needs both a status and a location', () => {
    expect(apiFieldParser.tryExtract(json({ status: 'Delivered' }), tn)).toBeNull();
  });

  it('treats numeric status fields as envelope codes', () => {
    expect(apiFieldParser.tryExtract(json({ status: 200, location: 'Columbus, OH' }), tn)).toBeNull();
  });
});

describe('extract', () => {
  it('prefers structured data over a table on the same page', () => {
    const ld = {
      '@type': 'ParcelDelivery',
      deliveryStatus: { name: 'Delivered', location: { address: { addressLocality: 'Columbus', addressRegion: 'OH' } } },
    };
    const result = extract(
      html(
        '<table><tr><td>In Transit 03/12/2024 Dayton, OH</td></tr></table>',
        `<script type="application/ld+json">${JSON.stringify(ld)}</script>`
      ),
      tn
    );
    expect(result?.parserId).toBe('structured-data');
    expect(result?.statusText).toBe('Delivered');
  });

  it('falls through to the api-field parser for JSON', () => {
    const result = extract(json({ status: 'Picked Up', location: 'Dayton, OH' }), tn);
    expect(result?.parserId).toBe('api-field');
  });

  it('skips a parser that throws and keeps going', () => {
    const broken: ExtractionParser = {
      id: 'tabular',
      confidence: 0.8,
      tryExtract() {
        throw new TypeError('row without cells');
      },
    };
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = extract(
      html('<div>Status: Delivered</div><div>Location: Fort Wayne, IN</div><div>Delivery Date: 03/14/2024</div>'),
      tn,
      [broken, patternParser],
      logger
    );

    expect(result?.parserId).toBe('pattern');
    expect(logger.warn).toHaveBeenCalledWith(
      'parser failed',
      expect.objectContaining({ parserId: 'tabular', trackingNumber: '1234567890' })
    );
  });

  it('survives numeric entities outside the unicode range', () => {
    const result = extract(
      html('<div>Status: Delivered</div><div>Location: Fort Wayne, IN</div><div>Delivery Date: 03/14/2024</div><p>&#x110000; &#99999999;</p>'),
      tn
    );
    expect(result).toEqual({
      parserId: 'pattern',
      confidence: 0.5,
      statusText: 'Delivered',
      location: 'Fort Wayne, IN',
      description: 'Delivered',
      timestamp: new Date('2024-03-14T00:00:00.000Z'),
    });
  });

  it('returns null when nothing matches', () => {
    expect(extract(html('<p>Enter a tracking number to begin.</p>'), tn)).toBeNull();
  });
});
