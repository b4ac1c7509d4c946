/**
 * Account emails
 *
 * Plain-text bodies for the forgot, confirm and registration flows. Links
 * carry the token in the query string and expire with it.
 */

import { InvalidConfigError } from '@gatehouse/auth';
import type { IssuedToken } from '@gatehouse/core';
import type { Logger } from '@gatehouse/observability';
import type { ForgotAction } from '@gatehouse/types';
import type { Services } from '../services/index.js';

export interface AuthEmail {
  to: string;
  subject: string;
  body: string;
}

interface EmailContext {
  appName: string;
  baseUrl: string;
}

function formatExpiry(expires: Date): string {
  return expires.toUTCString();
}

export function notRegisteredEmail(ctx: EmailContext, email: string, subject: string): AuthEmail {
  return {
    to: email,
    subject,
    body: [
      `The email address ${email} is not registered for ${ctx.appName}.`,
      '',
      `If you would like to register for ${ctx.appName}, please visit ${ctx.baseUrl}/register.`,
    ].join('\n'),
  };
}

export function forgotEmail(
  ctx: EmailContext,
  email: string,
  action: ForgotAction,
  username: string,
  token: IssuedToken
): AuthEmail {
  const subject = `${ctx.appName} forgot ${action} request`;
  if (!username) {
    return notRegisteredEmail(ctx, email, subject);
  }

  if (action === 'user') {
    return { to: email, subject, body: `Your user name for ${ctx.appName} is ${username}.` };
  }

  return {
    to: email,
    subject,
    body: [
      `To reset your password for ${ctx.appName}, please visit ${ctx.baseUrl}/reset?rtoken=${token.value} by ${formatExpiry(token.expires)}.`,
      '',
      `You can ignore this message if you did not request a reset password for ${ctx.appName}.`,
    ].join('\n'),
  };
}

export function confirmRequestEmail(
  ctx: EmailContext,
  email: string,
  username: string,
  token: IssuedToken
): AuthEmail {
  const subject = `${ctx.appName} confirm email`;
  if (!username) {
    return notRegisteredEmail(ctx, email, subject);
  }

  return {
    to: email,
    subject,
    body: confirmLinkText(ctx, token, `You can ignore this message if you did not request to confirm an email for ${ctx.appName}.`),
  };
}

export function registrationEmail(ctx: EmailContext, email: string, username: string, token: IssuedToken): AuthEmail {
  return {
    to: email,
    subject: `${ctx.appName} registration`,
    body: [
      `Thank you for registering ${username} with ${ctx.appName}.`,
      '',
      confirmLinkText(ctx, token, `You can request a new link at ${ctx.baseUrl}/confirm_request.`),
    ].join('\n'),
  };
}

export function confirmedEmail(ctx: EmailContext, email: string, username: string): AuthEmail {
  return {
    to: email,
    subject: `${ctx.appName} email confirmed`,
    body: `The email for ${username} has been confirmed for ${ctx.appName}.`,
  };
}

function confirmLinkText(ctx: EmailContext, token: IssuedToken, footer: string): string {
  return [
    `To confirm your email for ${ctx.appName}, please visit ${ctx.baseUrl}/confirm?ctoken=${token.value} by ${formatExpiry(token.expires)}.`,
    '',
    footer,
  ].join('\n');
}

/**
 * Send from the configured address. An incomplete SMTP configuration is a
 * deployment error and is logged as fatal before rethrowing.
 */
export async function sendAuthEmail(services: Services, logger: Logger, email: AuthEmail): Promise<void> {
  try {
    await services.mailer.sendMessage(services.config.mailFrom, [email.to], email.subject, email.body);
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      logger.fatal({ err: error, smtp: services.mailer.toJSON().smtp }, 'Mailer is not configured');
    }
    throw error;
  }
}

/**
 * Send without failing the request; state changes already committed stay.
 */
export async function sendAuthEmailBestEffort(services: Services, logger: Logger, email: AuthEmail): Promise<boolean> {
  try {
    await sendAuthEmail(services, logger, email);
    return true;
  } catch (error) {
    logger.error({ err: error, subject: email.subject }, 'Failed to send email');
    return false;
  }
}
