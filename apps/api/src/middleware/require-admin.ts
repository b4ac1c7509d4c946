import type { Context, Next } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * Only administrators get through; everyone else gets a plain 401
 */
export async function requireAdmin(c: Context<AppBindings>, next: Next) {
  const user = c.get('user');
  if (!user?.isAdmin) {
    c.get('logger').warn({ username: user?.username ?? '' }, 'Admin access denied');
    return c.text('Unauthorized', 401);
  }

  await next();
}
