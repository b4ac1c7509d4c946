/**
 * HTTP test helpers for integration tests
 * Drive the Hono app with form posts and carry the session cookie by hand
 */

import type { RegisterUserParams } from '@gatehouse/core';
import type { App } from '../app.js';

export function postForm(app: App, path: string, fields: Record<string, string>, cookie?: string) {
  return app.request(path, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      ...(cookie ? { Cookie: cookie } : {}),
    },
    body: new URLSearchParams(fields).toString(),
  });
}

export function get(app: App, path: string, cookie?: string) {
  return app.request(path, cookie ? { headers: { Cookie: cookie } } : {});
}

/**
 * The Set-Cookie header for a cookie name, if the response set one
 */
export function findSetCookie(response: Response, name: string): string | undefined {
  return response.headers.getSetCookie().find((header) => header.startsWith(`${name}=`));
}

/**
 * Cookie value as the browser would send it back
 */
export function extractCookie(response: Response, name: string): string | undefined {
  const header = findSetCookie(response, name);
  if (!header) {
    return undefined;
  }
  const [pair = ''] = header.split(';');
  return pair.slice(name.length + 1);
}

export async function registerUser(app: App, params: RegisterUserParams) {
  const response = await postForm(app, '/register', {
    username: params.username,
    fullName: params.fullName,
    email: params.email,
    password1: params.password,
    password2: params.password,
  });
  if (response.status !== 303) {
    throw new Error(`Registration failed with ${response.status}`);
  }
}

/**
 * Log in and return the Cookie header to send on later requests
 */
export async function loginAs(app: App, username: string, password: string): Promise<string> {
  const response = await postForm(app, '/login', { username, password });
  const value = extractCookie(response, 'session');
  if (response.status !== 303 || !value) {
    throw new Error(`Login failed with ${response.status}`);
  }
  return `session=${value}`;
}
