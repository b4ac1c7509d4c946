import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EventMessages } from '@gatehouse/core';
import { ForgotFormSchema, firstIssueMessage } from '@gatehouse/types';
import { forgotEmail, sendAuthEmail } from '../lib/emails.js';
import { usernameForEmail } from '../lib/form.js';
import { forgotForm } from '../views/forms.js';
import { renderPage } from '../views/layout.js';
import { sentPage } from '../views/pages.js';
import type { AppBindings } from '../types/context.js';

const TITLE = 'Forgot';

const forgotRoute = new Hono<AppBindings>();

forgotRoute.get('/', (c) => renderPage(c, TITLE, forgotForm()));

forgotRoute.post(
  '/',
  zValidator('form', ForgotFormSchema, (result, c) => {
    if (!result.success) {
      const message = firstIssueMessage(result.error);
      c.get('logger').warn({ message }, 'Invalid forgot form');
      return renderPage(c, TITLE, forgotForm(message));
    }
  }),
  async (c) => {
    const { email, action } = c.req.valid('form');
    const services = c.get('services');
    const { users, tokens, journal, config } = services;
    const logger = c.get('logger');

    const username = await usernameForEmail(users, email);
    if (!username) {
      logger.warn({ action }, 'Forgot request for unregistered email');
    }

    // An empty username yields an empty token and stores nothing
    const token = await tokens.issue('reset', username);
    if (username) {
      await journal.record('save_token', true, username, EventMessages.resetToken);
    }

    // Delivery failures surface as 500: the page must not claim an email was sent
    await sendAuthEmail(services, logger, forgotEmail(config, email, action, username, token));

    return renderPage(c, 'Email Sent', sentPage(email));
  }
);

export { forgotRoute };
