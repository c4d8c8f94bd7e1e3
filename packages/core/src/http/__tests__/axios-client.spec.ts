import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import axios from 'axios';
import nock from 'nock';
import { createAxiosHttpClient } from '../axios-client.js';

describe('createAxiosHttpClient', () => {
  beforeAll(() => nock.disableNetConnect());
  afterEach(() => nock.cleanAll());
  afterAll(() => nock.enableNetConnect());

  it('keeps the raw body when responseType is text', async () => {
    nock('https://carrier.test')
      .get('/track')
      .query({ pro: '0628143046' })
      .reply(200, '{"status":"Delivered"}', { 'Content-Type': 'application/json' });

    const client = createAxiosHttpClient({ debug: false });
    const res = await client.get('https://carrier.test/track', {
      params: { pro: '0628143046' },
      responseType: 'text',
    });

    expect(res.status).toBe(200);
    expect(res.body).toBe('{"status":"Delivered"}');
    expect(res.headers['content-type']).toBe('application/json');
  });

  it('parses JSON by default', async () => {
    nock('https://carrier.test').post('/api/track', { pro: '123' }).reply(200, { ok: true });

    const client = createAxiosHttpClient({ debug: false });
    const res = await client.post('https://carrier.test/api/track', { pro: '123' });

    expect(res.body).toEqual({ ok: true });
  });

  it('keeps set-cookie as an array', async () => {
    nock('https://carrier.test')
      .get('/page')
      .reply(200, 'ok', { 'Set-Cookie': ['sid=abc; Path=/', 'lang=en; Path=/'] });

    const client = createAxiosHttpClient({ debug: false });
    const res = await client.get('https://carrier.test/page', { responseType: 'text' });

    expect(res.headers['set-cookie']).toEqual(['sid=abc; Path=/', 'lang=en; Path=/']);
  });

  it('captures sanitized request details when asked', async () => {
    nock('https://carrier.test').get('/page').reply(200, 'ok');

    const client = createAxiosHttpClient({ debug: false });
    const res = await client.get('https://carrier.test/page', {
      responseType: 'text',
      captureRequest: true,
      headers: { Cookie: 'sid=abc', Accept: 'text/html' },
    });

    expect(res.request).toEqual({
      method: 'GET',
      url: 'https://carrier.test/page',
      headers: { Cookie: 'REDACTED', Accept: 'text/html' },
    });
  });

  it('hands the proxy to axios', async () => {
    let seen: unknown;
    const instance = axios.create({
      adapter: async (config) => {
        seen = config.proxy;
        return { data: 'ok', status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    const client = createAxiosHttpClient({ axiosInstance: instance, debug: false });

    await client.get('https://carrier.test/track', {
      responseType: 'text',
      proxy: { protocol: 'http', host: 'proxy.test', port: 3128, auth: { username: 'scraper', password: 'test-secret' } },
    });

    expect(seen).toEqual({
      protocol: 'http',
      host: 'proxy.test',
      port: 3128,
      auth: { username: 'scraper', password: 'test-secret' },
    });
  });
});
