import type { Context } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import type { IssuedToken } from '@gatehouse/core';

const SESSION_COOKIE_ATTRIBUTES = {
  path: '/',
  secure: true,
  httpOnly: true,
  sameSite: 'Strict',
} as const;

export function getSessionCookie(c: Context, name: string): string | undefined {
  return getCookie(c, name) || undefined;
}

/**
 * Persistent (with Expires) only when the user asked to be remembered;
 * otherwise a browser-session cookie.
 */
export function setSessionCookie(c: Context, name: string, token: IssuedToken, remember: boolean) {
  setCookie(c, name, token.value, {
    ...SESSION_COOKIE_ATTRIBUTES,
    ...(remember ? { expires: token.expires } : {}),
  });
}

// Max-Age=0 plus an Expires in the past
export function clearSessionCookie(c: Context, name: string) {
  deleteCookie(c, name, SESSION_COOKIE_ATTRIBUTES);
}
