import { RetrievalError, translateHttpError } from '../errors/index.js';
import { HttpError } from '../http/errors.js';
import type { HttpClientConfig, HttpResponse } from '../interfaces/http-client.js';
import type { RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import type { RequestKind } from '../session/session.js';

/**
 * Statuses whose body goes to the classifier instead of failing the attempt.
 * Block pages are usually served as 403/429/503.
 */
export interface PassThroughPolicy {
  statuses: readonly number[];
  minBodyBytes: number;
}

export const DEFAULT_PASS_THROUGH: PassThroughPolicy = {
  statuses: [403, 429, 503],
  minBodyBytes: 500,
};

export interface PageFetch {
  method: 'GET' | 'POST';
  url: string;
  kind: RequestKind;
  referer?: string;
  /** urlencoded string for forms, object for JSON */
  data?: string | Record<string, unknown>;
  headers?: Record<string, string>;
}

export function bodyText(body: unknown): string {
  if (typeof body === 'string') return body;
  if (body === undefined || body === null) return '';
  return JSON.stringify(body);
}

function headerValue(headers: Record<string, string | string[]>, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * The error to surface once the attempt signal has fired: the ladder aborts with a
 * RetrievalError (timeout or deadline); anything else means the caller cancelled.
 */
export function abortError(signal: AbortSignal, strategyId: string): RetrievalError {
  const reason: unknown = signal.reason;
  if (reason instanceof RetrievalError) return reason;
  return new RetrievalError('Request cancelled', 'Cancelled', { strategyId });
}

function toPayload(
  response: Pick<HttpResponse, 'status' | 'headers' | 'body' | 'url'>,
  requestedUrl: string
): RetrievedPayload {
  return {
    body: bodyText(response.body),
    status: response.status,
    url: response.url ?? requestedUrl,
    contentType: headerValue(response.headers, 'content-type'),
    headers: response.headers,
  };
}

/**
 * One browser-like request through the engine's HttpClient using the borrowed session.
 * Cookies are stored from every response, including error responses.
 */
export async function fetchPage(
  request: StrategyRequest,
  page: PageFetch,
  policy: PassThroughPolicy = DEFAULT_PASS_THROUGH
): Promise<RetrievedPayload> {
  const { ctx, session, signal, step } = request;
  const headers = session.buildHeaders({
    kind: page.kind,
    url: page.url,
    referer: page.referer,
    extra: page.headers,
  });
  const config: HttpClientConfig = {
    headers,
    signal,
    timeout: request.timeoutMs,
    responseType: 'text',
    ...(session.proxy && { proxy: session.proxy.endpoint }),
  };

  try {
    const response =
      page.method === 'POST'
        ? await ctx.http.post(page.url, page.data, config)
        : await ctx.http.get(page.url, config);
    session.storeCookies(response.url ?? page.url, response.headers['set-cookie']);
    return toPayload(response, page.url);
  } catch (error) {
    if (signal.aborted) throw abortError(signal, step.id);

    if (error instanceof HttpError && error.response) {
      const headersIn = error.response.headers ?? {};
      session.storeCookies(page.url, headersIn['set-cookie']);
      const payload = toPayload(
        { status: error.response.status, headers: headersIn, body: error.response.data },
        page.url
      );
      if (policy.statuses.includes(payload.status) && Buffer.byteLength(payload.body, 'utf8') >= policy.minBodyBytes) {
        return payload;
      }
    }
    throw translateHttpError(error, step.id);
  }
}

/**
 * Resolve a possibly relative URL against the page it was found on
 */
export function resolveUrl(href: string, base: string): string {
  return new URL(href, base).toString();
}
