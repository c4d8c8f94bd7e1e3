import Fastify, { type FastifyInstance } from 'fastify';
import { fileURLToPath } from 'node:url';
import { createTracker, loadEngineConfig, type Tracker } from '@protrace/core';
import { loadSeedConfig } from '@protrace/carriers';
import { makeHttpClient, wrapPinoLogger } from './http-client.js';
import { registerTrackRoutes } from './routes/track.js';

export interface ServerOptions {
  /** Prebuilt tracker; tests pass one wired to a fake HttpClient */
  tracker?: Tracker;
  logger?: boolean;
}

export async function buildServer(opts: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: opts.logger ?? true });

  const tracker =
    opts.tracker ??
    createTracker({
      // PROTRACE_CONFIG points at a full engine config; otherwise the seed carriers are used
      config: process.env.PROTRACE_CONFIG ? await loadEngineConfig() : loadSeedConfig(),
      http: makeHttpClient(fastify.log),
      logger: wrapPinoLogger(fastify.log),
      loggingOptions: {
        maxArrayItems: 5,
        maxDepth: 2,
        logRawResponse: 'summary',
        logMetadata: false,
      },
    });

  fastify.get('/health', {
    schema: { description: 'Health check' },
  }, async () => ({ status: 'ok', ts: new Date().toISOString(), carriers: tracker.carriers().length }));

  await registerTrackRoutes(fastify, tracker);

  fastify.addHook('onClose', async () => {
    await tracker.shutdown();
  });

  return fastify;
}

const start = async () => {
  const fastify = await buildServer();
  try {
    await fastify.listen({ port: Number(process.env.PORT) || 3000, host: '0.0.0.0' });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
