import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { IncorrectPasswordError, safeLocalRedirect } from '@gatehouse/auth';
import { EventMessages, UserNotFoundError } from '@gatehouse/core';
import { AuthMessages, LoginFormSchema, firstIssueMessage } from '@gatehouse/types';
import { setSessionCookie } from '../lib/session-cookie.js';
import { loginForm } from '../views/forms.js';
import { renderPage } from '../views/layout.js';
import type { AppBindings } from '../types/context.js';

const TITLE = 'Login';

const loginRoute = new Hono<AppBindings>();

loginRoute.get('/', (c) => renderPage(c, TITLE, loginForm(c.req.query('r'))));

loginRoute.post(
  '/',
  zValidator('form', LoginFormSchema, (result, c) => {
    if (!result.success) {
      const message = firstIssueMessage(result.error);
      c.get('logger').warn({ message }, 'Invalid login form');
      return renderPage(c, TITLE, loginForm(c.req.query('r'), message));
    }
  }),
  async (c) => {
    const { username, password, remember } = c.req.valid('form');
    const { users, tokens, journal, config } = c.get('services');

    try {
      await users.authenticate(username, password);
    } catch (error) {
      if (!(error instanceof UserNotFoundError || error instanceof IncorrectPasswordError)) {
        throw error;
      }
      // Same message for unknown users and wrong passwords
      await journal.record('login', false, username, EventMessages.loginFailed);
      return renderPage(c, TITLE, loginForm(c.req.query('r'), AuthMessages.loginFailed));
    }

    const token = await tokens.issue('session', username);
    setSessionCookie(c, config.sessionCookieName, token, remember);
    await journal.record('login', true, username, EventMessages.loggedIn);

    // Anything that is not a local path falls back to the home page.
    return c.redirect(safeLocalRedirect(c.req.query('r')), 303);
  }
);

export { loginRoute };
