import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EventMessages, ResetTokenExpiredError, TokenNotFoundError, UserNotFoundError } from '@gatehouse/core';
import { AuthMessages, ResetFormSchema, firstIssueMessage } from '@gatehouse/types';
import { formString } from '../lib/form.js';
import { resetForm } from '../views/forms.js';
import { renderPage } from '../views/layout.js';
import type { AppBindings } from '../types/context.js';

const TITLE = 'Reset Password';

const resetRoute = new Hono<AppBindings>();

resetRoute.get('/', (c) => renderPage(c, TITLE, resetForm(c.req.query('rtoken') ?? '')));

resetRoute.post(
  '/',
  zValidator('form', ResetFormSchema, async (result, c) => {
    if (!result.success) {
      const message = firstIssueMessage(result.error);
      c.get('logger').warn({ message }, 'Invalid reset form');
      return renderPage(c, TITLE, resetForm(await formString(c, 'rtoken'), message));
    }
  }),
  async (c) => {
    const { rtoken, password1 } = c.req.valid('form');
    const { users, tokens, journal } = c.get('services');
    const logger = c.get('logger');

    let username: string;
    try {
      username = await tokens.lookupUsername('reset', rtoken);
    } catch (error) {
      if (error instanceof UserNotFoundError) {
        logger.warn('Unknown reset token');
        return renderPage(c, TITLE, resetForm('', AuthMessages.invalidResetToken));
      }
      if (error instanceof ResetTokenExpiredError) {
        logger.warn('Expired reset token');
        return renderPage(c, TITLE, resetForm('', AuthMessages.resetTokenExpired));
      }
      throw error;
    }

    // Consume the token first so a concurrent submission cannot reuse it
    try {
      await tokens.remove('reset', rtoken);
    } catch (error) {
      if (!(error instanceof TokenNotFoundError)) {
        throw error;
      }
      return renderPage(c, TITLE, resetForm('', AuthMessages.invalidResetToken));
    }

    await users.updatePassword(username, password1);
    await journal.record('reset_pass', true, username, EventMessages.success);

    return c.redirect('/login', 303);
  }
);

export { resetRoute };
