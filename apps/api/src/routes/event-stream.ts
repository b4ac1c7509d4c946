/**
 * Server-sent events
 *
 * GET /event?event=<name> streams messages for one registered event until
 * the client goes away or the broadcaster closes. POST /send publishes.
 */

import { Hono } from 'hono';
import { stream } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { EventNotRegisteredError, formatMessage, type Subscriber } from '@gatehouse/sse';
import { requireAdmin } from '../middleware/require-admin.js';
import type { AppBindings } from '../types/context.js';

const SendQuerySchema = z.object({
  event: z.string().default(''),
  data: z.string().default(''),
  id: z.string().optional(),
  // empty means unset
  retry: z
    .string()
    .regex(/^\d*$/, 'retry must be a non-negative integer')
    .transform((value) => (value === '' ? undefined : Number(value)))
    .optional(),
});

const eventStreamRoute = new Hono<AppBindings>();

eventStreamRoute.get('/event', (c) => {
  const { broadcaster, config } = c.get('services');
  const logger = c.get('logger');
  const event = c.req.query('event') ?? '';

  let subscriber: Subscriber;
  try {
    subscriber = broadcaster.subscribe(c.get('requestId'), event);
  } catch (error) {
    if (error instanceof EventNotRegisteredError) {
      logger.warn({ event }, 'Subscription to unregistered event');
      return c.text('Not Found', 404);
    }
    throw error;
  }

  c.header('Content-Type', 'text/event-stream');
  c.header('Cache-Control', 'no-cache');
  c.header('Connection', 'keep-alive');
  c.header('Access-Control-Allow-Origin', config.sse.allowOrigin);

  return stream(c, async (out) => {
    out.onAbort(() => {
      logger.info({ subscriber: subscriber.id, event }, 'SSE client disconnected');
      broadcaster.unsubscribe(event, subscriber);
    });

    for await (const message of subscriber) {
      if (out.aborted) {
        break;
      }
      await out.write(formatMessage(message));
    }

    broadcaster.unsubscribe(event, subscriber);
    logger.info({ subscriber: subscriber.id, event }, 'SSE client done');
  });
});

eventStreamRoute.post(
  '/send',
  requireAdmin,
  zValidator('query', SendQuerySchema, (result, c) => {
    if (!result.success) {
      c.get('logger').warn({ issues: result.error.issues }, 'Invalid send request');
      return c.text('Unprocessable Entity', 422);
    }
  }),
  async (c) => {
    const message = c.req.valid('query');
    const { broadcaster } = c.get('services');

    try {
      await broadcaster.publish(message);
    } catch (error) {
      if (!(error instanceof EventNotRegisteredError)) {
        throw error;
      }
      c.get('logger').warn({ event: message.event }, 'Publish to unregistered event');
      return c.text('Unprocessable Entity', 422);
    }

    return c.body(null, 204);
  }
);

export { eventStreamRoute };
