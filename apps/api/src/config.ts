/**
 * Application configuration
 *
 * Parsed once from the environment into a validated record; invalid
 * combinations are rejected here rather than on first use.
 */

import { z } from 'zod';
import {
  DEFAULT_SESSION_COOKIE_NAME,
  DEFAULT_SESSION_TTL_SECONDS,
  MAX_SESSION_TTL_SECONDS,
  parseAddress,
  redactSmtpConfig,
} from '@gatehouse/auth';
import { DEFAULT_QUEUE_CAPACITY } from '@gatehouse/sse';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z
  .object({
    APP_NAME: z.string().min(1).default('Gatehouse'),
    BASE_URL: z.string().url().default('http://localhost:3000'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    DATABASE_PATH: z.string().min(1).default('gatehouse.db'),
    SESSION_COOKIE_NAME: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, 'must be a cookie token')
      .default(DEFAULT_SESSION_COOKIE_NAME),
    SESSION_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_SESSION_TTL_SECONDS, 'must be at most 400 days')
      .default(DEFAULT_SESSION_TTL_SECONDS),
    SMTP_HOST: z.string().default(''),
    SMTP_PORT: z.string().regex(/^\d*$/, 'must be a port number').default(''),
    SMTP_USERNAME: z.string().default(''),
    SMTP_PASSWORD: z.string().default(''),
    MAIL_FROM: z.string().optional(),
    SSE_EVENTS: z.string().default(''),
    SSE_ALLOW_ORIGIN: z.string().min(1).default('*'),
    SSE_QUEUE_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_QUEUE_CAPACITY),
    SSE_OVERFLOW: z.enum(['block', 'disconnect']).default('block'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    const smtp = [env.SMTP_HOST, env.SMTP_PORT, env.SMTP_USERNAME, env.SMTP_PASSWORD];
    const set = smtp.filter(Boolean).length;
    if (set > 0 && set < smtp.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SMTP_HOST'],
        message: 'SMTP_HOST, SMTP_PORT, SMTP_USERNAME and SMTP_PASSWORD must be set together',
      });
    }
    const from = env.MAIL_FROM ?? env.SMTP_USERNAME;
    if (from && !parseAddress(from)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MAIL_FROM'], message: 'must be an email address' });
    }
  })
  .transform((env) => ({
    appName: env.APP_NAME,
    baseUrl: env.BASE_URL.replace(/\/+$/, ''),
    port: env.PORT,
    databasePath: env.DATABASE_PATH,
    sessionCookieName: env.SESSION_COOKIE_NAME,
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      username: env.SMTP_USERNAME,
      password: env.SMTP_PASSWORD,
    },
    mailFrom: env.MAIL_FROM ?? env.SMTP_USERNAME,
    sse: {
      // the default (unnamed) event is always available
      events: [...new Set(['', ...env.SSE_EVENTS.split(',').map((name) => name.trim())])],
      allowOrigin: env.SSE_ALLOW_ORIGIN,
      queueCapacity: env.SSE_QUEUE_CAPACITY,
      overflow: env.SSE_OVERFLOW,
    },
    logLevel: env.LOG_LEVEL,
  }));

export type AppConfig = z.output<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * @throws {ConfigError} Listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}

/**
 * Configuration safe to log
 */
export function describeConfig(config: AppConfig) {
  return { ...config, smtp: redactSmtpConfig(config.smtp) };
}
