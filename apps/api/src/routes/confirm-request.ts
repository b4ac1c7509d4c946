import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EventMessages } from '@gatehouse/core';
import { ConfirmRequestFormSchema, firstIssueMessage } from '@gatehouse/types';
import { confirmRequestEmail, sendAuthEmail } from '../lib/emails.js';
import { usernameForEmail } from '../lib/form.js';
import { confirmRequestForm } from '../views/forms.js';
import { renderPage } from '../views/layout.js';
import { sentPage } from '../views/pages.js';
import type { AppBindings } from '../types/context.js';

const TITLE = 'Confirm Email';

const confirmRequestRoute = new Hono<AppBindings>();

confirmRequestRoute.get('/', (c) => renderPage(c, TITLE, confirmRequestForm()));

confirmRequestRoute.post(
  '/',
  zValidator('form', ConfirmRequestFormSchema, (result, c) => {
    if (!result.success) {
      const message = firstIssueMessage(result.error);
      c.get('logger').warn({ message }, 'Invalid confirm request form');
      return renderPage(c, TITLE, confirmRequestForm(message));
    }
  }),
  async (c) => {
    const { email } = c.req.valid('form');
    const services = c.get('services');
    const { users, tokens, journal, config } = services;
    const logger = c.get('logger');

    const username = await usernameForEmail(users, email);
    const token = await tokens.issue('confirm', username);
    if (username) {
      await journal.record('save_token', true, username, EventMessages.confirmToken);
    }

    await sendAuthEmail(services, logger, confirmRequestEmail(config, email, username, token));

    return renderPage(c, 'Email Sent', sentPage(email));
  }
);

export { confirmRequestRoute };
