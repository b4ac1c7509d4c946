import type { Context, Next } from 'hono';
import type { Services } from '../services/index.js';
import type { AppBindings } from '../types/context.js';

/**
 * Expose the service registry and a request-scoped logger, and log each
 * request once it completes.
 */
export function requestContext(services: Services) {
  return async function requestContextMiddleware(c: Context<AppBindings>, next: Next) {
    const startedAt = performance.now();
    const logger = services.logger.child({ requestId: c.get('requestId') });
    c.set('services', services);
    c.set('logger', logger);

    await next();

    logger.info(
      {
        req: c.req.raw,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
      'Request completed'
    );
  };
}
