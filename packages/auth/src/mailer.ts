import { createHash } from 'node:crypto';
import nodemailer from 'nodemailer';
import { z } from 'zod';
import { logger as defaultLogger, type Logger } from '@gatehouse/observability';
import {
  InvalidConfigError,
  InvalidFromError,
  InvalidRecipientError,
  NoRecipientsError,
  SendFailedError,
} from './errors.js';

export interface SmtpConfig {
  host: string;
  port: string;
  username: string;
  password: string;
}

export interface RawMail {
  envelope: { from: string; to: string[] };
  raw: string;
}

/**
 * The slice of a nodemailer transporter the mailer uses.
 */
export interface MailTransport {
  sendMail(mail: RawMail): Promise<unknown>;
}

export interface MailerOptions {
  transport?: MailTransport;
  logger?: Logger;
}

export function redactSmtpConfig(config: SmtpConfig): SmtpConfig {
  return { ...config, password: config.password ? '[REDACTED]' : '' };
}

export function isSmtpConfigComplete(config: SmtpConfig): boolean {
  return Boolean(config.host && config.port && config.username && config.password);
}

export function getRecipientLogId(email: string): string {
  return createHash('sha256').update(email.trim().toLowerCase()).digest('hex').slice(0, 12);
}

const addrSpec = z.string().email();
const NAMED_ADDRESS = /^([^<>]*)<([^<>]+)>$/;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Parse a mailbox (`user@host` or `Display Name <user@host>`) and return
 * its address part, or null when it is not a valid mailbox.
 */
export function parseAddress(value: string): string | null {
  if (CONTROL_CHARS.test(value)) {
    return null;
  }
  const trimmed = value.trim();
  const named = NAMED_ADDRESS.exec(trimmed);
  const address = named ? (named[2] ?? '').trim() : trimmed;
  return addrSpec.safeParse(address).success ? address : null;
}

/**
 * Build the plain-text message: From, To and Subject headers, a blank line,
 * then the body. Lines end in CRLF.
 */
export function formatMessage(from: string, to: string[], subject: string, body: string): string {
  const headers = [`From: ${from}`, `To: ${to.join(', ')}`, `Subject: ${subject.replace(/[\r\n]+/g, ' ')}`];
  return `${headers.join('\r\n')}\r\n\r\n${body.replace(/\r?\n/g, '\r\n')}`;
}

/**
 * Plain-text SMTP mailer authenticating with AUTH PLAIN.
 */
export class Mailer {
  private transport: MailTransport | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly config: SmtpConfig,
    options: MailerOptions = {}
  ) {
    this.transport = options.transport;
    this.logger = options.logger ?? defaultLogger;
  }

  async sendMessage(from: string, to: string[], subject: string, body: string): Promise<void> {
    if (!isSmtpConfigComplete(this.config)) {
      throw new InvalidConfigError();
    }

    const fromAddress = parseAddress(from);
    if (!fromAddress) {
      throw new InvalidFromError(from);
    }

    if (to.length === 0) {
      throw new NoRecipientsError();
    }

    const recipients: string[] = [];
    for (const recipient of to) {
      const address = parseAddress(recipient);
      if (!address) {
        throw new InvalidRecipientError(recipient);
      }
      recipients.push(address);
    }

    const mail: RawMail = {
      envelope: { from: fromAddress, to: recipients },
      raw: formatMessage(from, to, subject, body),
    };

    try {
      await this.getTransport().sendMail(mail);
    } catch (error) {
      throw new SendFailedError(error instanceof Error ? error.message : undefined, { cause: error });
    }

    this.logger.info({ recipients: recipients.map(getRecipientLogId), subject }, 'Email sent');
  }

  toJSON(): { smtp: SmtpConfig } {
    return { smtp: redactSmtpConfig(this.config) };
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      const port = Number.parseInt(this.config.port, 10);
      this.transport = nodemailer.createTransport({
        host: this.config.host,
        port,
        secure: port === 465,
        auth: { user: this.config.username, pass: this.config.password },
        authMethod: 'PLAIN',
      });
    }
    return this.transport;
  }
}
