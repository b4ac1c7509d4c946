import { Hono } from 'hono';
import type { AppBindings } from '../types/context.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  const { broadcaster } = c.get('services');
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    subscribers: broadcaster.totalSubscribers(),
  };

  return c.json(response);
});

export { healthRoute };
