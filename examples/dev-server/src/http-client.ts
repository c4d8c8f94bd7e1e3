import type { FastifyBaseLogger } from 'fastify';
import { createAxiosHttpClient, type HttpClient, type Logger } from '@protrace/core';

/**
 * Wrapper to convert Fastify's Pino logger to our Logger interface.
 * Pino takes the fields first ({ msg, ...fields }); our Logger takes (message, meta).
 */
export function wrapPinoLogger(pinoLogger: FastifyBaseLogger): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.debug({ msg: message, ...meta });
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.info({ msg: message, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.warn({ msg: message, ...meta });
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.error({ msg: message, ...meta });
    },
  };
}

// Call after Fastify is created so the client's debug logs route through Fastify's logger
export function makeHttpClient(logger?: FastifyBaseLogger): HttpClient {
  return createAxiosHttpClient({
    defaultTimeoutMs: Number(process.env.HTTP_TIMEOUT_MS) || 15_000,
    debug: process.env.HTTP_DEBUG === '1',
    debugFullBody: process.env.HTTP_DEBUG_FULL === '1',
    logger: logger ? wrapPinoLogger(logger) : undefined,
  });
}
