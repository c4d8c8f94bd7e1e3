/**
 * Tracking routes
 *
 * - POST /api/track (single tracking number)
 * - POST /api/track/batch (list, 200 or 207)
 * - GET /api/identify/:trackingNumber
 */

import type { FastifyInstance } from 'fastify';
import {
  getHttpStatusForBatchJob,
  safeValidateBatchRequest,
  safeValidateTrackRequest,
  type Tracker,
} from '@protrace/core';

interface IdentifyParams {
  trackingNumber: string;
}

export async function registerTrackRoutes(fastify: FastifyInstance, tracker: Tracker) {
  fastify.post('/api/track', {
    schema: { description: 'Retrieve the latest status of one tracking number' },
  }, async (request, reply) => {
    const validation = safeValidateTrackRequest(request.body);
    if (!validation.success) {
      return reply.status(400).send({
        message: 'Invalid request',
        details: validation.error.flatten(),
      });
    }

    const controller = new AbortController();
    // client went away before the answer was written
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    const { trackingNumber, carrierHint } = validation.data;
    const result = await tracker.track(trackingNumber, { carrierHint, signal: controller.signal });
    return reply.status(200).send(result);
  });

  fastify.post('/api/track/batch', {
    schema: { description: 'Retrieve statuses for a list of tracking numbers' },
  }, async (request, reply) => {
    const validation = safeValidateBatchRequest(request.body);
    if (!validation.success) {
      return reply.status(400).send({
        message: 'Invalid request',
        details: validation.error.flatten(),
      });
    }

    const { trackingNumbers, carrierHint } = validation.data;
    const job = await tracker.trackBatch(trackingNumbers, { carrierHint });

    fastify.log.info({
      summary: job.summary,
      attempted: job.attempted,
      succeeded: job.succeeded,
      failed: job.failed,
    }, 'batch tracked');

    return reply.status(getHttpStatusForBatchJob(job)).send(job);
  });

  fastify.get<{ Params: IdentifyParams }>('/api/identify/:trackingNumber', {
    schema: { description: 'Identify the carrier of a tracking number without fetching anything' },
  }, async (request, reply) => {
    const identification = tracker.identify(request.params.trackingNumber);
    return reply.send({
      carrier: identification.carrier,
      confidence: identification.confidence,
      trackingNumber: identification.trackingNumber.normalized,
      candidates: tracker.candidates(request.params.trackingNumber),
    });
  });
}
