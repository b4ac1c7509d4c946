import type { Context, Next } from 'hono';
import { UserSessionExpiredError, UserSessionNotFoundError } from '@gatehouse/core';
import { clearSessionCookie, getSessionCookie } from '../lib/session-cookie.js';
import type { AppBindings } from '../types/context.js';

/**
 * Resolve the session cookie to a user. A stale or unknown session clears
 * the cookie and continues anonymously; storage failures propagate.
 */
export async function sessionMiddleware(c: Context<AppBindings>, next: Next) {
  const { config, users } = c.get('services');
  const value = getSessionCookie(c, config.sessionCookieName);

  c.set('user', null);
  if (value) {
    try {
      c.set('user', await users.userBySessionToken(value));
    } catch (error) {
      if (!(error instanceof UserSessionNotFoundError || error instanceof UserSessionExpiredError)) {
        throw error;
      }
      c.get('logger').info({ reason: error.name }, 'Clearing invalid session cookie');
      clearSessionCookie(c, config.sessionCookieName);
    }
  }

  await next();
}
