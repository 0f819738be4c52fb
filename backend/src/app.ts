import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import fastifyWebsocket from '@fastify/websocket';
import { ZodError } from 'zod';
import { env } from './config/env.js';
import { registerRoutes } from './api/routes.js';
import { setupWebSocketGateway } from './core/websocket/index.js';
import { AppError } from './common/errors.js';
import type { Logger } from './common/logger.js';
import { DatasetStore } from './modules/dataset/dataset.store.js';
import { TrainingService } from './modules/training/training.service.js';
import type { TrainingSessionDeps } from './modules/training/training.session.js';

export interface BuildAppOptions {
  logLevel?: string;
  datasets?: DatasetStore;
  /** Overrides for every session the app starts (pacing sleep, split randomness, reference fit). */
  session?: Omit<TrainingSessionDeps, 'logger'>;
  logger?: Logger;
  websocket?: boolean;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  const datasets = options.datasets ?? new DatasetStore();
  const training = new TrainingService(datasets, {
    ...options.session,
    logger: options.logger ?? app.log,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // WebSocket plugin - register at root level
  if (options.websocket ?? env.WS_ENABLED) {
    app.register(fastifyWebsocket, {
      options: { maxPayload: 1048576 },
    });
    app.register(async (fastify) => setupWebSocketGateway(fastify, training));
    app.log.info('WebSocket plugin registered');
  }

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      app.log.warn({ code: err.code, message: err.message }, 'Request failed');
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map((i) => i.message).join('; '),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.register(async (fastify) =>
    registerRoutes(fastify, {
      datasets,
      training,
      minTrainingRows: env.MIN_TRAINING_ROWS,
    })
  );

  return app;
}
