import { describe, it, expect, vi } from 'vitest';
import {
  createChallengeBypassStrategy,
  createDirectFetchStrategy,
  createFormSubmitStrategy,
  createJsonApiStrategy,
  createMirrorLookupStrategy,
  createRenderStrategy,
  expandTemplate,
  solveArithmetic,
} from '../index.js';
import { NotImplementedError, RetrievalError } from '../../errors/index.js';
import { createTrackingNumber } from '../../identify/tracking-number.js';
import { FINGERPRINT_CATALOG } from '../../session/fingerprint-catalog.js';
import type { PageRenderer, RenderedPage, RenderRequest } from '../../interfaces/renderer.js';
import type { StrategyRequest } from '../../interfaces/strategy.js';
import type { CarrierProfile, StrategyStep } from '../../types/carrier.js';
import { FakeHttpClient, htmlPage, testProfile, testSession, type FakeHandler } from '../../__tests__/fakes.js';

const tn = createTrackingNumber('0628-143046');

function setup(
  handler: FakeHandler,
  step: StrategyStep,
  opts: { signal?: AbortSignal; profile?: CarrierProfile } = {}
): { http: FakeHttpClient; request: StrategyRequest } {
  const http = new FakeHttpClient(handler);
  return {
    http,
    request: {
      trackingNumber: tn,
      profile: opts.profile ?? testProfile(),
      step,
      session: testSession(),
      signal: opts.signal ?? new AbortController().signal,
      timeoutMs: 1_000,
      ctx: { http },
    },
  };
}

const directStep: StrategyStep = {
  id: 'direct-fetch',
  kind: 'direct-fetch',
  method: 'GET',
  url: 'https://carrier.test/track?pro={trackingNumber}',
};

describe('expandTemplate', () => {
  it('fills compact and raw numbers and the carrier slug', () => {
    expect(
      expandTemplate('https://m.test/{carrierSlug}/{trackingNumber}?q={rawTrackingNumber}', tn, { mirrorSlug: 'rl-carriers' })
    ).toBe('https://m.test/rl-carriers/0628143046?q=0628-143046');
  });
});

describe('direct-fetch', () => {
  it('sends browser headers and keeps cookies for the next request', async () => {
    const { http, request } = setup(
      () => ({
        body: htmlPage('<p>Shipment found</p>'),
        headers: { 'content-type': 'text/html', 'set-cookie': ['sid=abc; Path=/'] },
      }),
      directStep
    );
    const strategy = createDirectFetchStrategy();

    const payload = await strategy.execute(request);
    await strategy.execute(request);

    expect(strategy.defaultTimeoutMs).toBe(8_000);
    expect(payload.status).toBe(200);
    expect(payload.contentType).toBe('text/html');
    expect(payload.url).toBe('https://carrier.test/track?pro=0628143046');
    expect(http.requests[0].url).toBe('https://carrier.test/track?pro=0628143046');
    expect(http.requests[0].headers['User-Agent']).toBe(FINGERPRINT_CATALOG[0].userAgent);
    expect(http.requests[0].headers['Cookie']).toBeUndefined();
    expect(http.requests[1].headers['Cookie']).toBe('sid=abc');
  });

  it('passes substantial block pages through to the classifier', async () => {
    const { request } = setup(() => ({ status: 403, body: htmlPage('<h1>Access denied</h1>') }), directStep);
    const payload = await createDirectFetchStrategy().execute(request);
    expect(payload.status).toBe(403);
  });

  it('measures the pass-through minimum in bytes', async () => {
    // 264 UTF-16 code units, 518 bytes
    const body = `<h1>Доступ запрещён</h1>${'Ж'.repeat(240)}`;
    const { request } = setup(() => ({ status: 403, body }), directStep);

    const payload = await createDirectFetchStrategy().execute(request);

    expect(payload.status).toBe(403);
    expect(payload.body).toBe(body);
  });

  it('fails short error bodies and other statuses', async () => {
    const short = setup(() => ({ status: 403, body: 'Forbidden' }), directStep);
    await expect(createDirectFetchStrategy().execute(short.request)).rejects.toMatchObject({
      name: 'RetrievalError',
      kind: 'HttpStatusError',
      status: 403,
    });

    const notFound = setup(() => ({ status: 404, body: htmlPage('<h1>Not found</h1>') }), directStep);
    await expect(createDirectFetchStrategy().execute(notFound.request)).rejects.toMatchObject({
      kind: 'HttpStatusError',
      status: 404,
    });
  });

  it('maps connection failures to NetworkError', async () => {
    const { request } = setup(() => ({ errorCode: 'ECONNREFUSED' }), directStep);
    await expect(createDirectFetchStrategy().execute(request)).rejects.toMatchObject({ kind: 'NetworkError' });
  });

  it('surfaces the timeout that aborted the attempt', async () => {
    const controller = new AbortController();
    const { request } = setup(() => ({ delayMs: 1_000, body: htmlPage('') }), directStep, {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(new RetrievalError('Timed out after 20ms', 'Timeout')), 20);

    await expect(createDirectFetchStrategy().execute(request)).rejects.toMatchObject({
      kind: 'Timeout',
      message: 'Timed out after 20ms',
    });
  });

  it('reports caller cancellation as Cancelled', async () => {
    const controller = new AbortController();
    const { request } = setup(() => ({ delayMs: 1_000, body: htmlPage('') }), directStep, {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 20);

    await expect(createDirectFetchStrategy().execute(request)).rejects.toMatchObject({ kind: 'Cancelled' });
  });
});

describe('form-submit', () => {
  it('fills the tracking form and sends hidden fields back', async () => {
    const step: StrategyStep = {
      id: 'form-submit',
      kind: 'form-submit',
      method: 'GET',
      pageUrl: 'https://carrier.test/tracking',
    };
    const { http, request } = setup((req) => {
      if (req.method === 'GET') {
        return {
          body: htmlPage(
            '<form action="/tracking/results" method="post">' +
              '<input type="hidden" name="_csrf" value="csrf-test-token">' +
              '<input type="text" name="proNumber">' +
              '<button type="submit">Track</button></form>'
          ),
          headers: { 'content-type': 'text/html', 'set-cookie': 'sid=form; Path=/' },
        };
      }
      return { body: htmlPage('<p>Results</p>') };
    }, step);

    await createFormSubmitStrategy().execute(request);

    expect(http.requests).toHaveLength(2);
    const submit = http.requests[1];
    expect(submit.method).toBe('POST');
    expect(submit.url).toBe('https://carrier.test/tracking/results');
    expect(submit.data).toBe('_csrf=csrf-test-token&proNumber=0628143046');
    expect(submit.headers['Referer']).toBe('https://carrier.test/tracking');
    expect(submit.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(submit.headers['Cookie']).toBe('sid=form');
    expect(request.session.getToken('csrf')).toBe('csrf-test-token');
  });

  it('returns the form page itself when it is already blocked', async () => {
    const step: StrategyStep = { id: 'form-submit', kind: 'form-submit', method: 'GET', pageUrl: 'https://carrier.test/tracking' };
    const { http, request } = setup(() => ({ status: 503, body: htmlPage('<h1>Checking your browser</h1>') }), step);

    const payload = await createFormSubmitStrategy().execute(request);
    expect(payload.status).toBe(503);
    expect(http.requests).toHaveLength(1);
  });
});

describe('json-api', () => {
  it('posts the body template as JSON with the stored CSRF token', async () => {
    const step: StrategyStep = {
      id: 'json-api',
      kind: 'json-api',
      method: 'POST',
      url: 'https://carrier.test/api/track',
      body: { pro: '{trackingNumber}', source: 'web' },
    };
    const apiBody = { status: 'Delivered', location: 'Columbus, OH' };
    const { http, request } = setup(
      () => ({ body: apiBody, headers: { 'content-type': 'application/json' } }),
      step
    );
    request.session.setToken('csrf', 'csrf-test-token');

    const payload = await createJsonApiStrategy().execute(request);

    expect(http.requests[0].data).toEqual({ pro: '0628143046', source: 'web' });
    expect(http.requests[0].headers['X-CSRF-Token']).toBe('csrf-test-token');
    expect(http.requests[0].headers['Accept']).toBe('application/json, text/plain, */*');
    expect(payload.body).toBe(JSON.stringify(apiBody));
    expect(payload.contentType).toBe('application/json');
  });
});

describe('challenge-bypass', () => {
  const step: StrategyStep = {
    id: 'challenge-bypass',
    kind: 'challenge-bypass',
    method: 'GET',
    pageUrl: 'https://carrier.test/verify',
    url: 'https://carrier.test/track?pro={trackingNumber}',
  };

  it('answers an arithmetic question through the challenge form', async () => {
    const { http, request } = setup((req) => {
      if (req.method === 'GET') {
        return {
          status: 503,
          body: htmlPage(
            '<p>Please verify you are human. What is 7 + 5?</p>' +
              '<form action="/verify" method="post">' +
              '<input type="hidden" name="challenge_token" value="tok-test">' +
              '<input type="text" name="answer"></form>'
          ),
        };
      }
      return { body: htmlPage('<p>Results</p>') };
    }, step);

    await createChallengeBypassStrategy().execute(request);

    expect(http.requests[1].method).toBe('POST');
    expect(http.requests[1].url).toBe('https://carrier.test/verify');
    expect(http.requests[1].data).toBe('challenge_token=tok-test&answer=12');
  });

  it('re-requests the target with the cookies and token it was given', async () => {
    const { http, request } = setup((req) => {
      if (req.url === 'https://carrier.test/verify') {
        return {
          body: htmlPage('<p>One moment</p>', '<meta name="csrf-token" content="csrf-meta-test">'),
          headers: { 'content-type': 'text/html', 'set-cookie': ['clearance=ok; Path=/'] },
        };
      }
      return { body: htmlPage('<p>Results</p>') };
    }, step);

    await createChallengeBypassStrategy().execute(request);

    const retry = http.requests[1];
    expect(retry.url).toBe('https://carrier.test/track?pro=0628143046');
    expect(retry.headers['X-CSRF-Token']).toBe('csrf-meta-test');
    expect(retry.headers['Cookie']).toBe('clearance=ok');
    expect(retry.headers['Referer']).toBe('https://carrier.test/verify');
    expect(request.session.getToken('csrf')).toBe('csrf-meta-test');
  });
});

describe('solveArithmetic', () => {
  it('solves questions and script assignments', () => {
    expect(solveArithmetic('What is 7 + 5?')).toBe(12);
    expect(solveArithmetic('Solve: 9 x 3')).toBe(27);
    expect(solveArithmetic('var answer = 20 - 8;')).toBe(12);
    expect(solveArithmetic('Enter your PRO number')).toBeUndefined();
  });
});

describe('mirror-lookup', () => {
  it('fills the carrier slug into the mirror template', async () => {
    const step: StrategyStep = {
      id: 'mirror:trackingmore',
      kind: 'mirror-lookup',
      method: 'GET',
      url: 'https://mirror.test/{carrierSlug}/{trackingNumber}',
    };
    const { http, request } = setup(() => ({ body: htmlPage('') }), step, {
      profile: testProfile({ mirrorSlug: 'estes-express' }),
    });

    await createMirrorLookupStrategy().execute(request);
    expect(http.requests[0].url).toBe('https://mirror.test/estes-express/0628143046');
  });
});

describe('render', () => {
  const step: StrategyStep = { ...directStep, id: 'render', kind: 'render' };

  it('is not available without a renderer', async () => {
    const { request } = setup(() => ({}), step);
    await expect(createRenderStrategy().execute(request)).rejects.toBeInstanceOf(NotImplementedError);
  });

  it('renders with the session identity and keeps the page cookies', async () => {
    const render = vi.fn(
      async (req: RenderRequest): Promise<RenderedPage> => ({
        html: htmlPage('<p>Rendered</p>'),
        status: 200,
        url: req.url,
        cookies: [{ name: 'rendered', value: '1', domain: '.carrier.test', path: '/' }],
      })
    );
    const renderer: PageRenderer = { render, close: vi.fn(async () => undefined) };
    const { request } = setup(() => ({}), step);

    const payload = await createRenderStrategy({ renderer }).execute(request);

    expect(payload.status).toBe(200);
    expect(payload.contentType).toBe('text/html');
    const sent = render.mock.calls[0][0];
    expect(sent.url).toBe('https://carrier.test/track?pro=0628143046');
    expect(sent.userAgent).toBe(FINGERPRINT_CATALOG[0].userAgent);
    expect(sent.headers['User-Agent']).toBeUndefined();
    expect(request.session.cookieCount).toBe(1);
  });
});
