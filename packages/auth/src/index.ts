/**
 * @gatehouse/auth
 *
 * Authentication primitives
 * - Password hashing/verification
 * - Opaque token generation and hashing, token-kind defaults
 * - SMTP mailer
 * - Local redirect validation
 *
 * Stores and flows built on these live in @gatehouse/core and the API app.
 */

// Password utilities
export { hashPassword, verifyPassword, SCRYPT_PARAMS } from './password.js';

// Tokens
export { generateTokenValue, hashTokenValue } from './token-hash.js';
export {
  DEFAULT_SESSION_COOKIE_NAME,
  DEFAULT_SESSION_TTL_SECONDS,
  MAX_SESSION_TTL_SECONDS,
  ONE_TIME_TOKEN_TTL_SECONDS,
  TOKEN_KIND_DEFAULTS,
  tokenLifetimeMs,
} from './token-kinds.js';
export type { TokenKindDefaults } from './token-kinds.js';

// Mail
export {
  Mailer,
  formatMessage,
  getRecipientLogId,
  isSmtpConfigComplete,
  parseAddress,
  redactSmtpConfig,
} from './mailer.js';
export type { MailTransport, MailerOptions, RawMail, SmtpConfig } from './mailer.js';

// Redirects
export { safeLocalRedirect, validateLocalRedirect } from './safe-redirect.js';
export type { RedirectValidation } from './safe-redirect.js';

export * from './errors.js';
