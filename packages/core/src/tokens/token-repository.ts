/**
 * Token Repository
 *
 * Data access layer for the tokens table. Rows are keyed by (hash, kind).
 */

import { and, eq } from 'drizzle-orm';
import { tokens, users, type AuthDatabase, type NewTokenRow } from '@gatehouse/database';
import type { TokenKind } from '@gatehouse/types';
import type { TokenOwner } from './token-types.js';

export class TokenRepository {
  constructor(private db: AuthDatabase) {}

  /**
   * Insert a token only if its owner exists, in one transaction.
   * @returns false when the user does not exist
   */
  async insertForUser(data: NewTokenRow): Promise<boolean> {
    return this.db.transaction((tx) => {
      const owner = tx
        .select({ username: users.username })
        .from(users)
        .where(eq(users.username, data.username))
        .get();
      if (!owner) {
        return false;
      }
      tx.insert(tokens).values(data).run();
      return true;
    });
  }

  async findOwner(kind: TokenKind, hashedValue: string): Promise<TokenOwner | null> {
    const row = this.db
      .select({ username: tokens.username, expires: tokens.expires })
      .from(tokens)
      .where(and(eq(tokens.kind, kind), eq(tokens.hashedValue, hashedValue)))
      .get();
    return row ?? null;
  }

  /**
   * @returns number of rows deleted (0 or 1)
   */
  async delete(kind: TokenKind, hashedValue: string): Promise<number> {
    const result = this.db
      .delete(tokens)
      .where(and(eq(tokens.kind, kind), eq(tokens.hashedValue, hashedValue)))
      .run();
    return result.changes;
  }
}
