/**
 * WebSocket Gateway — /ws/training
 *
 * Client → server:
 *   { action: 'start', params }
 *   { action: 'pause' | 'resume' | 'stop' }
 *
 * Server → client: TrainingMessage frames, plus
 *   { type: 'control', status, message } replies to control actions.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { errorMessage } from '../../common/errors.js';
import { parseInput } from '../../common/validation.js';
import type { TrainingService } from '../../modules/training/training.service.js';
import { parseTrainingParams } from '../../modules/training/training.params.js';
import type { ControlStatus, TrainingMessage } from '../../modules/training/training.types.js';

const ClientMessageSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('start'), params: z.unknown() }),
  z.object({ action: z.literal('pause') }),
  z.object({ action: z.literal('resume') }),
  z.object({ action: z.literal('stop') }),
]);

export interface ControlReply {
  type: 'control';
  status: ControlStatus;
  message: string;
}

export type ServerFrame = TrainingMessage | ControlReply;

export interface TrainingChannel {
  onMessage: (text: string) => Promise<void>;
  onClose: () => void;
}

/**
 * Socket-independent protocol handling, one per connection.
 * A dropped connection stops the session it started.
 */
export function createTrainingChannel(
  service: TrainingService,
  send: (frame: ServerFrame) => void
): TrainingChannel {
  let ownedSessionId: string | null = null;

  const fail = (message: string): void => {
    send({ type: 'error', error: true, message });
  };

  async function onMessage(text: string): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      fail('Invalid JSON message');
      return;
    }

    try {
      const message = parseInput(ClientMessageSchema, raw);
      switch (message.action) {
        case 'start': {
          const { session, messages } = service.start(parseTrainingParams(message.params));
          ownedSessionId = session.id;
          for await (const frame of messages) {
            send(frame);
          }
          return;
        }
        case 'pause':
        case 'resume':
        case 'stop': {
          const result = service[message.action]();
          send({ type: 'control', status: result.status, message: result.message });
          return;
        }
      }
    } catch (err) {
      fail(errorMessage(err));
    }
  }

  function onClose(): void {
    const current = service.currentSession;
    if (current && current.id === ownedSessionId && current.state !== 'inactive') {
      current.stop();
      service.logger.info({ sessionId: current.id }, 'WebSocket closed; training stop requested');
    }
  }

  return { onMessage, onClose };
}

export async function setupWebSocketGateway(app: FastifyInstance, service: TrainingService): Promise<void> {
  app.get('/ws/training', { websocket: true }, (socket, req) => {
    req.log.info('Training WebSocket connected');

    const channel = createTrainingChannel(service, (frame) => {
      socket.send(JSON.stringify(frame));
    });

    socket.on('message', (data) => {
      channel.onMessage(data.toString()).catch((err: unknown) => {
        req.log.error({ err: errorMessage(err) }, 'WebSocket message handling failed');
      });
    });

    socket.on('close', () => {
      channel.onClose();
      req.log.info('Training WebSocket disconnected');
    });
  });

  console.log('[WS] Training gateway registered at /ws/training');
}
