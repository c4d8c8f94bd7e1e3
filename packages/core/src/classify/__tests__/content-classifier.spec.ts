import { describe, it, expect } from 'vitest';
import { analyzeContent, classify, countScriptMarkers } from '../content-classifier.js';
import type { RetrievedPayload } from '../../interfaces/strategy.js';
import { htmlPage } from '../../__tests__/fakes.js';

function payload(body: string, extra: Partial<RetrievedPayload> = {}): RetrievedPayload {
  return { body, status: 200, url: 'https://carrier.test/track', headers: {}, ...extra };
}

describe('classify', () => {
  it('treats short markup as empty', () => {
    expect(analyzeContent('<p>Not found</p>')).toMatchObject({
      verdict: 'EMPTY',
      reason: 'payload of 16 bytes is below the 500-byte minimum',
    });
  });

  it('judges compact JSON by content', () => {
    expect(classify('{"status":"Delivered","location":"Columbus, OH"}')).toBe('USABLE_CONTENT');
    expect(classify('{}')).toBe('EMPTY');
    expect(classify('[]')).toBe('EMPTY');
  });

  it('flags a tag manager snippet that mentions the tracking number', () => {
    const snippet = "<script>function f(){var pro='0628143046';gtm.js}</script>";

    const analysis = analyzeContent(snippet);

    expect(analysis.verdict).toBe('SCRIPT_NOT_DATA');
    expect(analysis.reason).toContain('script markup');
  });

  it('flags script-heavy pages under the real-page size', () => {
    const script = [
      'var a = 1;',
      'let b = 2;',
      'const c = 3;',
      'function go() {}',
      'window.dataLayer = [];',
      'document.cookie;',
      'items.push(1);',
    ].join('\n');
    const body = htmlPage(`<div>Tracking 0628143046</div><script>${script}</script>`);

    expect(countScriptMarkers(body)).toBeGreaterThan(5);
    expect(classify(body)).toBe('SCRIPT_NOT_DATA');
  });

  it('keeps large pages with some script usable', () => {
    const script = '<script>var a = 1; var b = 2; var c = 3; var d = 4; var e = 5; var f = 6;</script>';
    const body = htmlPage(`<table><tr><td>Delivered 03/14/2024 Columbus, OH</td></tr></table>${'<p>row</p>'.repeat(2_000)}${script}`);

    expect(classify(body)).toBe('USABLE_CONTENT');
  });

  it('detects block pages by keyword and names the mechanism', () => {
    const analysis = analyzeContent(payload(htmlPage('<h1>Checking your browser before accessing</h1>'), { status: 503 }));

    expect(analysis.verdict).toBe('ANTI_BOT_BLOCK');
    expect(analysis.mechanism).toBe('cloudflare_challenge');
    expect(analysis.reason).toBe('anti-bot block detected (cloudflare_challenge): matched "checking your browser"');
  });

  it('checks carrier-specific block keywords', () => {
    const body = htmlPage('<h1>Our tracking system is resting</h1>');

    expect(classify(body)).toBe('USABLE_CONTENT');
    expect(classify(body, { blockKeywords: ['system is resting'] })).toBe('ANTI_BOT_BLOCK');
  });

  it('reads challenge and rate-limit signals from the response', () => {
    const body = htmlPage('<p>One moment</p>');

    expect(classify(payload(body, { headers: { 'cf-mitigated': 'challenge' } }))).toBe('ANTI_BOT_BLOCK');
    expect(
      analyzeContent(payload(body, { status: 429, headers: { 'retry-after': '30' } })).reason
    ).toBe('anti-bot block detected (rate_limit): HTTP 429, retry-after 30');
  });

  it('recognises a cloudflare challenge script behind cf-ray', () => {
    const body = htmlPage('<p>One moment</p>', '<script src="/cdn-cgi/challenge-platform/h/b/orchestrate/jsch/v1"></script>');

    const analysis = analyzeContent(payload(body, { status: 403, headers: { 'cf-ray': '8a1b2c3d4e5f-EWR' } }));

    expect(analysis.verdict).toBe('ANTI_BOT_BLOCK');
    expect(analysis.mechanism).toBe('cloudflare_challenge');
    expect(classify(payload(body))).toBe('USABLE_CONTENT');
  });

  it('treats a page that only asks for javascript as a challenge', () => {
    const body =
      `<html><head><style>${'.shell{display:block}'.repeat(40)}</style></head>` +
      '<body><div id="root"></div><noscript>Please enable JavaScript to continue.</noscript></body></html>';

    const analysis = analyzeContent(body);

    expect(analysis).toMatchObject({
      verdict: 'ANTI_BOT_BLOCK',
      mechanism: 'javascript_challenge',
      reason: 'anti-bot block detected (javascript_challenge): page requires script execution',
    });
  });

  it('never labels JavaScript responses as content', () => {
    const body = htmlPage('<p>Delivered</p>');

    expect(classify(payload(body, { headers: { 'content-type': 'application/javascript' } }))).toBe('SCRIPT_NOT_DATA');
  });

  it('accepts an ordinary tracking page', () => {
    expect(classify(htmlPage('<table><tr><td>Delivered 03/14/2024 Columbus, OH</td></tr></table>'))).toBe(
      'USABLE_CONTENT'
    );
  });
});
