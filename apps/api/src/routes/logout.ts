import { Hono } from 'hono';
import { EventMessages, TokenNotFoundError } from '@gatehouse/core';
import { clearSessionCookie, getSessionCookie } from '../lib/session-cookie.js';
import { logoutPage } from '../views/pages.js';
import { renderPage } from '../views/layout.js';
import type { AppBindings } from '../types/context.js';

const logoutRoute = new Hono<AppBindings>();

logoutRoute.get('/', async (c) => {
  const { tokens, journal, config } = c.get('services');
  const logger = c.get('logger');
  const value = getSessionCookie(c, config.sessionCookieName);
  const username = c.get('user')?.username ?? '';

  clearSessionCookie(c, config.sessionCookieName);

  if (value) {
    try {
      await tokens.remove('session', value);
    } catch (error) {
      if (!(error instanceof TokenNotFoundError)) {
        throw error;
      }
      logger.debug('Session already removed');
    }
  }

  await journal.record('logout', true, username, EventMessages.loggedOut);

  c.set('user', null);
  return renderPage(c, 'Logout', logoutPage());
});

export { logoutRoute };
