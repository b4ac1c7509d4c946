import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EventMessages } from '@gatehouse/core';
import { AuthMessages, RegisterFormSchema, firstIssueMessage } from '@gatehouse/types';
import { registrationEmail, sendAuthEmailBestEffort } from '../lib/emails.js';
import { registerForm } from '../views/forms.js';
import { renderPage } from '../views/layout.js';
import type { AppBindings } from '../types/context.js';

const TITLE = 'Register';

const registerRoute = new Hono<AppBindings>();

registerRoute.get('/', (c) => renderPage(c, TITLE, registerForm()));

registerRoute.post(
  '/',
  zValidator('form', RegisterFormSchema, (result, c) => {
    if (!result.success) {
      const message = firstIssueMessage(result.error);
      c.get('logger').warn({ message }, 'Invalid registration form');
      return renderPage(c, TITLE, registerForm(message));
    }
  }),
  async (c) => {
    const form = c.req.valid('form');
    const services = c.get('services');
    const { users, tokens, journal, config } = services;
    const logger = c.get('logger');

    if (await users.existsByUsername(form.username)) {
      await journal.record('register', false, form.username, EventMessages.usernameExists);
      return renderPage(c, TITLE, registerForm(AuthMessages.usernameExists));
    }

    if (await users.existsByEmail(form.email)) {
      await journal.record('register', false, form.username, EventMessages.emailExists);
      return renderPage(c, TITLE, registerForm(AuthMessages.emailExists));
    }

    await users.register({
      username: form.username,
      fullName: form.fullName,
      email: form.email,
      password: form.password1,
    });
    await journal.record('register', true, form.username, EventMessages.registered);

    // Registration stands even if the confirmation email cannot be sent
    const token = await tokens.issue('confirm', form.username);
    await sendAuthEmailBestEffort(services, logger, registrationEmail(config, form.email, form.username, token));

    return c.redirect('/login', 303);
  }
);

export { registerRoute };
