import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  ConfirmTokenExpiredError,
  EventMessages,
  UserAlreadyConfirmedError,
  UserNotFoundError,
} from '@gatehouse/core';
import { AuthMessages, ConfirmFormSchema, firstIssueMessage } from '@gatehouse/types';
import { confirmedEmail, sendAuthEmailBestEffort } from '../lib/emails.js';
import { confirmForm } from '../views/forms.js';
import { renderPage } from '../views/layout.js';
import type { AppBindings } from '../types/context.js';

const TITLE = 'Confirm';

const confirmRoute = new Hono<AppBindings>();

confirmRoute.get('/', (c) => renderPage(c, TITLE, confirmForm(c.req.query('ctoken') ?? '')));

confirmRoute.post(
  '/',
  zValidator('form', ConfirmFormSchema, (result, c) => {
    if (!result.success) {
      const message = firstIssueMessage(result.error);
      c.get('logger').warn({ message }, 'Invalid confirm form');
      return renderPage(c, TITLE, confirmForm('', message));
    }
  }),
  async (c) => {
    const { ctoken } = c.req.valid('form');
    const services = c.get('services');
    const { users, tokens, journal, config } = services;
    const logger = c.get('logger');

    let username: string;
    try {
      username = await tokens.lookupUsername('confirm', ctoken);
    } catch (error) {
      if (error instanceof UserNotFoundError) {
        return renderPage(c, TITLE, confirmForm('', AuthMessages.invalidConfirmToken));
      }
      if (error instanceof ConfirmTokenExpiredError) {
        return renderPage(c, TITLE, confirmForm('', AuthMessages.confirmTokenExpired));
      }
      throw error;
    }

    try {
      await users.confirmUser(username);
    } catch (error) {
      if (!(error instanceof UserAlreadyConfirmedError)) {
        throw error;
      }
      // Reveals that the account is confirmed; kept so users know to log in
      return renderPage(c, TITLE, confirmForm('', AuthMessages.alreadyConfirmed));
    }

    try {
      await tokens.remove('confirm', ctoken);
    } catch (error) {
      logger.warn({ err: error }, 'Failed to remove confirm token');
    }

    await journal.record('confirmed', true, username, EventMessages.success);

    const user = await users.userByName(username);
    await sendAuthEmailBestEffort(services, logger, confirmedEmail(config, user.email, username));

    return c.redirect('/login', 303);
  }
);

export { confirmRoute };
