/**
 * HTTP API Tests (in-process via app.inject)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app.js';

const csv = [
  'hours,score',
  ...Array.from({ length: 12 }, (_, i) => `${i + 1},${2 * (i + 1) + 1}`),
].join('\n');

const trainingBody = {
  learningRate: 0.1,
  maxEpochs: 3,
  tolerance: 0,
  trainingSpeed: 'fastest',
};

function parseEvents(body: string): Array<Record<string, unknown>> {
  return body
    .split('\n\n')
    .filter((chunk) => chunk.startsWith('data: '))
    .map((chunk) => JSON.parse(chunk.slice('data: '.length)));
}

describe('API routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = buildApp({
      logLevel: 'silent',
      websocket: false,
      session: { sleep: async () => undefined, random: () => 0.5 },
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  const processDataset = () =>
    app.inject({
      method: 'POST',
      url: '/api/dataset/process',
      payload: { csv, xColumn: 'hours', yColumn: 'score', filename: 'study.csv' },
    });

  it('GET /api/health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, datasetLoaded: false, training: 'idle' });
  });

  it('returns the not-found envelope for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  describe('dataset', () => {
    it('POST /api/dataset/analyze reports quality without storing', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/dataset/analyze',
        payload: { csv, xColumn: 'hours', yColumn: 'score' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.summary).toEqual(['Data looks clean!']);

      const current = await app.inject({ method: 'GET', url: '/api/dataset' });
      expect(current.statusCode).toBe(404);
    });

    it('POST /api/dataset/process stores the cleaned dataset', async () => {
      const res = await processDataset();

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.message).toBe('Data processed successfully!');
      expect(body.data.cleaningSummary.cleanedRows).toBe(12);
      expect(body.data.readyForTraining).toBe(true);

      const current = await app.inject({ method: 'GET', url: '/api/dataset' });
      expect(current.json().data).toMatchObject({ filename: 'study.csv', rows: 12 });
    });

    it('POST /api/dataset/process rejects a missing column', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/dataset/process',
        payload: { csv, xColumn: 'hours', yColumn: 'grade' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'Column "grade" not found in CSV (available: hours, score)',
      });
    });
  });

  describe('training', () => {
    it('POST /api/training/start without data returns 400', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/training/start', payload: trainingBody });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('No cleaned data available for training');
    });

    it('POST /api/training/start rejects bad hyperparameters before streaming', async () => {
      await processDataset();
      const res = await app.inject({
        method: 'POST',
        url: '/api/training/start',
        payload: { ...trainingBody, learningRate: -1 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'learningRate: learningRate must be > 0',
      });
    });

    it('POST /api/training/start streams epochs then completion', async () => {
      await processDataset();
      const res = await app.inject({ method: 'POST', url: '/api/training/start', payload: trainingBody });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toContain('text/event-stream');

      const events = parseEvents(res.body);
      expect(events.map((e) => e.type)).toEqual(['epoch', 'epoch', 'epoch', 'complete']);
      expect(events[3]).toMatchObject({ stopReason: 'MAX_EPOCHS', epochsRun: 3, xRange: [1, 12] });
      expect(res.headers['x-session-id']).toBe(events[3].sessionId);
    });

    it('control endpoints answer when nothing is running', async () => {
      for (const action of ['pause', 'resume', 'stop'] as const) {
        const res = await app.inject({ method: 'POST', url: `/api/training/${action}` });

        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({
          ok: true,
          message: `No active training to ${action}`,
          status: 'NOT_ACTIVE',
        });
      }
    });
  });

  describe('model', () => {
    it('returns 404 before any training', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/model/predict', payload: { x: [1] } });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('NOT_FOUND');
    });

    it('predicts and summarizes after training', async () => {
      await processDataset();
      await app.inject({ method: 'POST', url: '/api/training/start', payload: trainingBody });

      const predict = await app.inject({ method: 'POST', url: '/api/model/predict', payload: { x: [1, 12] } });
      expect(predict.statusCode).toBe(200);
      const { predictions } = predict.json().data;
      expect(predictions).toHaveLength(2);
      expect(predictions[1]).toBeGreaterThan(predictions[0]);

      const summary = await app.inject({ method: 'GET', url: '/api/model/summary' });
      expect(summary.json().data.trainingExamples).toBe(9);
    });

    it('rejects an empty prediction input', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/model/predict', payload: { x: [] } });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('x: x must contain at least one value');
    });
  });
});

describe('SSE training stream over a socket', () => {
  let app: FastifyInstance;
  let baseUrl: string;

  beforeEach(async () => {
    app = buildApp({
      logLevel: 'silent',
      websocket: false,
      session: {
        sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.min(ms, 5))),
        random: () => 0.5,
      },
    });
    baseUrl = await app.listen({ port: 0, host: '127.0.0.1' });
  });

  afterEach(async () => {
    await app.close();
  });

  const trainingState = async (): Promise<string> => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    return res.json().training;
  };

  const waitForState = async (state: string): Promise<string> => {
    let current = await trainingState();
    for (let i = 0; i < 100 && current !== state; i++) {
      await new Promise((resolve) => setTimeout(resolve, 10));
      current = await trainingState();
    }
    return current;
  };

  it('stops a paused run when the client disconnects', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/dataset/process',
      payload: { csv, xColumn: 'hours', yColumn: 'score' },
    });

    const controller = new AbortController();
    const res = await fetch(`${baseUrl}/api/training/start`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ ...trainingBody, maxEpochs: 100000 }),
      signal: controller.signal,
    });
    expect(res.status).toBe(200);
    if (!res.body) throw new Error('expected a streaming body');

    const first = await res.body.getReader().read();
    expect(first.done).toBe(false);

    const pause = await app.inject({ method: 'POST', url: '/api/training/pause' });
    expect(pause.json().status).toBe('PAUSED');
    expect(await trainingState()).toBe('paused');

    controller.abort();

    expect(await waitForState('inactive')).toBe('inactive');

    const restart = await app.inject({
      method: 'POST',
      url: '/api/training/start',
      payload: { ...trainingBody, maxEpochs: 2 },
    });
    expect(restart.statusCode).toBe(200);
    expect(parseEvents(restart.body).map((e) => e.type)).toEqual(['epoch', 'epoch', 'complete']);
  });
});
