export type { HttpClient, HttpClientConfig, HttpResponse, ProxyEndpoint } from './http-client.js';
export type { Logger } from './logger.js';
export type { EngineContext, LoggingOptions, TelemetryClient } from './engine-context.js';
export type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from './strategy.js';
export type { ExtractionParser, RawExtraction } from './parser.js';
export type { PageRenderer, RenderRequest, RenderedPage, RenderCookie } from './renderer.js';
