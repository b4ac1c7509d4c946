import type { TokenKind } from '@gatehouse/types';

export const DEFAULT_SESSION_TTL_SECONDS = 24 * 60 * 60;
/** Browsers cap cookie `Expires` at 400 days; Hono refuses anything later. */
export const MAX_SESSION_TTL_SECONDS = 400 * 24 * 60 * 60;
export const ONE_TIME_TOKEN_TTL_SECONDS = 5 * 60;
export const DEFAULT_SESSION_COOKIE_NAME = 'session';

export interface TokenKindDefaults {
  /** Bytes of entropy before encoding */
  size: number;
  ttlSeconds: number;
  cookieName?: string;
}

export const TOKEN_KIND_DEFAULTS: Record<TokenKind, TokenKindDefaults> = {
  session: { size: 32, ttlSeconds: DEFAULT_SESSION_TTL_SECONDS, cookieName: DEFAULT_SESSION_COOKIE_NAME },
  reset: { size: 12, ttlSeconds: ONE_TIME_TOKEN_TTL_SECONDS },
  confirm: { size: 12, ttlSeconds: ONE_TIME_TOKEN_TTL_SECONDS },
};

/**
 * Lifetime of a token kind in milliseconds, with the session lifetime
 * taken from configuration when given.
 */
export function tokenLifetimeMs(kind: TokenKind, sessionTtlSeconds?: number): number {
  const seconds = kind === 'session' && sessionTtlSeconds !== undefined
    ? sessionTtlSeconds
    : TOKEN_KIND_DEFAULTS[kind].ttlSeconds;
  return seconds * 1000;
}
