import type { Context } from 'hono';
import { UserNotFoundError, type UserService } from '@gatehouse/core';

/**
 * Trimmed string value of a submitted form field, or '' when absent.
 * The parsed body is cached, so validators and handlers can both read it.
 */
export async function formString(c: Context, key: string): Promise<string> {
  const body = await c.req.parseBody();
  const value = body[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Username registered to an email, or '' so unknown addresses follow the
 * same path as known ones.
 */
export async function usernameForEmail(users: UserService, email: string): Promise<string> {
  try {
    return await users.usernameByEmail(email);
  } catch (error) {
    if (error instanceof UserNotFoundError) {
      return '';
    }
    throw error;
  }
}
