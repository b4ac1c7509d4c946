/**
 * @gatehouse/observability
 *
 * Structured logging for the auth service and its packages.
 */

export { createLogger, logger, maskTokenQuery, REDACTION_PATHS } from './logger.js';
export type { Logger } from './logger.js';
