import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import type { HttpClient, HttpClientConfig, HttpResponse } from "../interfaces/http-client.js";
import type { Logger } from '../interfaces/logger.js';
import { HttpError } from './errors.js';
import { sanitizeHeadersForLog } from '../utils/logging.js';

export interface AxiosHttpClientOptions {
  axiosInstance?: AxiosInstance;
  defaultTimeoutMs?: number;
  debug?: boolean;
  debugFullBody?: boolean;
  logger?: Logger;
}

type Method = 'GET' | 'POST';

/**
 * Flatten axios headers into plain lower-case records
 */
export function normalizeResponseHeaders(headers: object): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') out[key.toLowerCase()] = value;
    else if (Array.isArray(value)) out[key.toLowerCase()] = value.map((v) => String(v));
    else if (typeof value === 'number' || typeof value === 'boolean') out[key.toLowerCase()] = String(value);
  }
  return out;
}

function bodyLength(body: unknown): number {
  if (body === undefined || body === null) return 0;
  if (typeof body === 'string') return body.length;
  try {
    return JSON.stringify(body).length;
  } catch {
    return 0;
  }
}

/**
 * Create a HttpClient implementation backed by Axios.
 * - Rejects non-2xx with an HttpError that keeps `status` and `response.data`.
 * - Transport failures keep the axios error `code` (ECONNABORTED, ERR_CANCELED, ...).
 * - Supports `responseType: 'json'|'text'` and AbortSignal through config.
 */
export function createAxiosHttpClient(opts: AxiosHttpClientOptions = {}): HttpClient {
  const instance: AxiosInstance =
    opts.axiosInstance ??
    axios.create({ timeout: opts.defaultTimeoutMs ?? 30_000 });

  function toAxiosConfig(config?: HttpClientConfig): AxiosRequestConfig {
    const ac: AxiosRequestConfig = {};
    if (!config) return ac;
    if (config.headers) ac.headers = config.headers;
    if (typeof config.timeout === "number") ac.timeout = config.timeout;
    if (config.params) ac.params = config.params;
    if (config.signal) ac.signal = config.signal;
    if (typeof config.maxRedirects === "number") ac.maxRedirects = config.maxRedirects;
    if (config.proxy) ac.proxy = config.proxy;
    if (config.responseType === "text") {
      ac.responseType = "text";
      // keep the raw body even when the server claims JSON
      ac.transformResponse = [(data: unknown) => data];
    }
    return ac;
  }

  function defaultLogger(): Logger {
    return {
      debug: (m: string, meta?: Record<string, unknown>) => console.debug('[http][debug]', m, meta),
      info: (m: string, meta?: Record<string, unknown>) => console.info('[http][info]', m, meta),
      warn: (m: string, meta?: Record<string, unknown>) => console.warn('[http][warn]', m, meta),
      error: (m: string, meta?: Record<string, unknown>) => console.error('[http][error]', m, meta),
    };
  }

  function toHttpError(err: unknown): unknown {
    if (axios.isAxiosError(err)) {
      return new HttpError(err.message, {
        isAxiosError: true,
        code: err.code,
        status: err.response?.status,
        response: err.response
          ? {
              status: err.response.status,
              statusText: err.response.statusText,
              data: err.response.data,
              headers: normalizeResponseHeaders(err.response.headers),
            }
          : undefined,
      });
    }
    // Non-axios error, rethrow as-is
    return err;
  }

  const resolvedDebug = opts.debug ?? (process.env.HTTP_DEBUG === '1');
  const resolvedFull = opts.debugFullBody ?? (process.env.HTTP_DEBUG_FULL === '1');
  const log = opts.logger ?? defaultLogger();

  async function send(method: Method, url: string, data: unknown, config?: HttpClientConfig): Promise<HttpResponse> {
    const ac = toAxiosConfig(config);
    if (resolvedDebug) {
      const logObj: Record<string, unknown> = {
        method,
        url,
        headers: sanitizeHeadersForLog(config?.headers),
      };
      if (method === 'POST') {
        logObj.bodyLength = bodyLength(data);
        if (resolvedFull && data !== undefined) logObj.body = data;
      }
      log.debug('request', logObj);
    }

    try {
      const res = await instance.request<unknown>({ method, url, data, ...ac });
      const headers = normalizeResponseHeaders(res.headers);
      if (resolvedDebug) {
        const logObj: Record<string, unknown> = {
          status: res.status,
          statusText: res.statusText,
          headers: sanitizeHeadersForLog(headers),
        };
        if (resolvedFull) {
          logObj.body = res.data;
        } else {
          logObj.bodyLength = bodyLength(res.data);
        }
        log.debug('response', logObj);
      }
      const finalUrl: unknown = res.request?.res?.responseUrl;
      return {
        status: res.status,
        headers,
        body: res.data,
        ...(typeof finalUrl === 'string' && { url: finalUrl }),
        ...(config?.captureRequest && {
          request: { method, url, headers: sanitizeHeadersForLog(config.headers) },
        }),
      };
    } catch (err) {
      const normalized = toHttpError(err);
      if (resolvedDebug) {
        const logObj: Record<string, unknown> = normalized instanceof HttpError
          ? {
              status: normalized.response?.status,
              statusText: normalized.response?.statusText,
              code: normalized.code,
              error: normalized.message,
            }
          : { error: normalized instanceof Error ? normalized.message : String(normalized) };
        if (resolvedFull && normalized instanceof HttpError && normalized.response?.data) {
          logObj.body = normalized.response.data;
        }
        log.debug('error', logObj);
      }
      throw normalized;
    }
  }

  return {
    get(url: string, config?: HttpClientConfig): Promise<HttpResponse> {
      return send('GET', url, undefined, config);
    },
    post(url: string, data?: unknown, config?: HttpClientConfig): Promise<HttpResponse> {
      return send('POST', url, data, config);
    },
  };
}

export default createAxiosHttpClient;
