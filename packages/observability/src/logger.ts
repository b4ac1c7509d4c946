import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Redact credentials from logs
 * - Form fields carrying passwords
 * - Token values (session cookies, reset and confirm tokens)
 * - SMTP configuration secrets
 */
export const REDACTION_PATHS = [
  'password',
  'password1',
  'password2',
  'hashedPassword',
  'token',
  'rtoken',
  'ctoken',
  'cookie',
  'authorization',
  'smtp.password',
  'config.smtp.password',
  'headers.cookie',
  'headers.authorization',
];

const TOKEN_QUERY_PATTERN = /([?&](?:rtoken|ctoken)=)[^&#\s]*/g;

/**
 * Mask reset and confirm tokens carried in URLs or messages.
 */
export function maskTokenQuery(value: string): string {
  return value.replace(TOKEN_QUERY_PATTERN, '$1[REDACTED]');
}

function serializeRequest(req: unknown): unknown {
  if (req instanceof Request) {
    const url = new URL(req.url);
    return {
      method: req.method,
      url: maskTokenQuery(`${url.pathname}${url.search}`),
      requestId: req.headers.get('x-request-id') ?? undefined,
    };
  }
  return req;
}

/**
 * Create a structured logger instance with Pino
 *
 * Log level comes from LOG_LEVEL unless overridden. Pass a destination
 * stream to capture output (tests do).
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const loggerOptions: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: serializeRequest,
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        for (let index = 0; index < args.length; index += 1) {
          const arg = args[index];
          if (typeof arg === 'string') {
            args[index] = maskTokenQuery(arg);
          }
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
