import type { SessionUser } from '@gatehouse/core';
import type { Logger } from '@gatehouse/observability';
import type { Services } from '../services/index.js';

/**
 * Shared Hono context variables for requests.
 */
export type ContextVariables = {
  requestId: string;
  /** Child logger bound to the request id */
  logger: Logger;
  services: Services;
  /** Session user, or null when there is no valid session */
  user: SessionUser | null;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
