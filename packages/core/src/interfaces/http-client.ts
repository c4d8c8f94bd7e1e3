/**
 * Standardized HTTP response
 *
 * All HttpClient implementations normalize to this shape so strategies never inspect
 * library-specific response objects.
 */
export interface HttpResponse<T = unknown> {
  /**
   * HTTP status code (e.g., 200, 403, 503)
   */
  status: number;

  /**
   * Response headers (lower-case keys; set-cookie stays an array)
   */
  headers: Record<string, string | string[]>;

  /**
   * Response body
   * - For `responseType: 'text'`: the raw string
   * - For JSON: parsed value (T)
   */
  body: T;

  /**
   * Final URL after redirects, when the client can tell
   */
  url?: string;

  /**
   * Optional: request that was sent (populated when config.captureRequest is true)
   */
  request?: {
    method: string;
    url: string;
    headers?: Record<string, string>;
  };
}

/**
 * HttpClient interface
 * Pluggable HTTP layer used by every retrieval strategy.
 *
 * Implementations reject non-2xx responses with an `HttpError` carrying the response,
 * so callers can still inspect the body of a 403 or 503 page.
 */
export interface HttpClient {
  get(url: string, config?: HttpClientConfig): Promise<HttpResponse>;

  post(url: string, data?: unknown, config?: HttpClientConfig): Promise<HttpResponse>;
}

export interface HttpClientConfig {
  /**
   * Request headers to send
   */
  headers?: Record<string, string>;

  /**
   * Request timeout in milliseconds
   */
  timeout?: number;

  /**
   * Query parameters (appended to URL)
   */
  params?: Record<string, string>;

  /**
   * Expected response type hint
   * - "json": parse response as JSON (default)
   * - "text": keep the body as a string
   */
  responseType?: 'json' | 'text';

  /**
   * Aborts the in-flight request
   */
  signal?: AbortSignal;

  /**
   * Maximum redirects to follow (client default when omitted)
   */
  maxRedirects?: number;

  /**
   * Route the request through this forward proxy
   */
  proxy?: ProxyEndpoint;

  /**
   * Whether to capture request details in response (for debugging)
   */
  captureRequest?: boolean;
}

/**
 * Forward proxy address, in the shape axios takes
 */
export interface ProxyEndpoint {
  protocol: 'http' | 'https';
  host: string;
  port: number;
  auth?: { username: string; password: string };
}
