/**
 * TRAINING — Routes
 * ==================
 *
 * ENDPOINTS:
 *   POST /api/training/start    - Start a run; streams messages as SSE
 *   POST /api/training/pause    - Pause the running session
 *   POST /api/training/resume   - Resume a paused session
 *   POST /api/training/stop     - Request a cooperative stop
 *   POST /api/model/predict     - Predict with the last trained model
 *   GET  /api/model/summary     - Last trained model summary
 */

import { Readable } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseInput } from '../../common/validation.js';
import { parseTrainingParams } from './training.params.js';
import type { TrainingService } from './training.service.js';
import type { TrainingMessage } from './training.types.js';

const PredictSchema = z.object({
  x: z.array(z.number().finite()).min(1, 'x must contain at least one value'),
});

export function formatSSE(message: TrainingMessage): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}

async function* toEventStream(messages: AsyncIterable<TrainingMessage>): AsyncGenerator<string> {
  for await (const message of messages) {
    yield formatSSE(message);
  }
}

export async function registerTrainingRoutes(app: FastifyInstance, service: TrainingService): Promise<void> {
  const prefix = '/api/training';

  // ═══════════════════════════════════════════════════════════════
  // START (streaming)
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/start`, async (request, reply) => {
    // Both throw before the first byte, so the error handler still owns the reply
    const params = parseTrainingParams(request.body);
    const { session, messages } = service.start(params);

    request.log.info({ sessionId: session.id }, 'Streaming training session');

    // A dropped client must not leave a paused run holding the single session slot
    reply.raw.on('close', () => {
      if (session.state !== 'inactive') {
        session.stop();
        request.log.info({ sessionId: session.id }, 'Client disconnected; training stop requested');
      }
    });

    reply.header('Content-Type', 'text/event-stream');
    reply.header('Cache-Control', 'no-cache');
    reply.header('X-Session-Id', session.id);
    return reply.send(Readable.from(toEventStream(messages)));
  });

  // ═══════════════════════════════════════════════════════════════
  // CONTROL
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/pause`, async () => {
    const result = service.pause();
    return { ok: true, message: result.message, status: result.status };
  });

  app.post(`${prefix}/resume`, async () => {
    const result = service.resume();
    return { ok: true, message: result.message, status: result.status };
  });

  app.post(`${prefix}/stop`, async () => {
    const result = service.stop();
    return { ok: true, message: result.message, status: result.status };
  });

  // ═══════════════════════════════════════════════════════════════
  // MODEL
  // ═══════════════════════════════════════════════════════════════

  app.post('/api/model/predict', async (request) => {
    const { x } = parseInput(PredictSchema, request.body);
    return { ok: true, data: { x, predictions: service.predict(x) } };
  });

  app.get('/api/model/summary', async () => {
    return { ok: true, data: service.modelSummary() };
  });

  console.log('[Training] Routes registered');
}
