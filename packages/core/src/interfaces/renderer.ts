import type { ProxyEndpoint } from './http-client.js';

export interface RenderCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
}

export interface RenderRequest {
  url: string;
  userAgent: string;
  headers: Record<string, string>;
  cookies: RenderCookie[];
  timeoutMs: number;
  signal: AbortSignal;
  /** Render inside a browser context routed through this proxy */
  proxy?: ProxyEndpoint;
}

export interface RenderedPage {
  html: string;
  status: number;
  url: string;
  cookies: RenderCookie[];
}

/**
 * PageRenderer
 * Full browser rendering for single-page tracking sites.
 */
export interface PageRenderer {
  render(request: RenderRequest): Promise<RenderedPage>;
  close(): Promise<void>;
}
