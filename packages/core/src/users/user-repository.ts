/**
 * User Repository
 *
 * Data access layer for the users table.
 * Pure drizzle operations with no business logic.
 */

import { and, asc, eq } from 'drizzle-orm';
import { tokens, users, type AuthDatabase, type NewUserRow, type UserRow } from '@gatehouse/database';

export interface SessionLookup {
  user: UserRow;
  expires: Date;
}

export class UserRepository {
  constructor(private db: AuthDatabase) {}

  async existsByUsername(username: string): Promise<boolean> {
    const row = this.db
      .select({ username: users.username })
      .from(users)
      .where(eq(users.username, username))
      .get();
    return row !== undefined;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const row = this.db.select({ username: users.username }).from(users).where(eq(users.email, email)).get();
    return row !== undefined;
  }

  /**
   * Insert a user. Unique violations surface as the driver's error.
   */
  async create(data: NewUserRow): Promise<void> {
    this.db.insert(users).values(data).run();
  }

  async findByUsername(username: string): Promise<UserRow | null> {
    return this.db.select().from(users).where(eq(users.username, username)).get() ?? null;
  }

  async findPasswordHash(username: string): Promise<string | null> {
    const row = this.db
      .select({ hashedPassword: users.hashedPassword })
      .from(users)
      .where(eq(users.username, username))
      .get();
    return row?.hashedPassword ?? null;
  }

  async findUsernameByEmail(email: string): Promise<string | null> {
    const row = this.db.select({ username: users.username }).from(users).where(eq(users.email, email)).get();
    return row?.username ?? null;
  }

  /**
   * Join a session token hash to its owner
   */
  async findBySessionHash(hashedValue: string): Promise<SessionLookup | null> {
    const row = this.db
      .select({ user: users, expires: tokens.expires })
      .from(tokens)
      .innerJoin(users, eq(tokens.username, users.username))
      .where(and(eq(tokens.kind, 'session'), eq(tokens.hashedValue, hashedValue)))
      .get();
    return row ?? null;
  }

  /**
   * Set the confirmed flag if it is not set yet.
   * @returns number of rows changed (0 or 1)
   */
  async markConfirmed(username: string): Promise<number> {
    const result = this.db
      .update(users)
      .set({ confirmed: true })
      .where(and(eq(users.username, username), eq(users.confirmed, false)))
      .run();
    return result.changes;
  }

  async updatePasswordHash(username: string, hashedPassword: string): Promise<number> {
    const result = this.db.update(users).set({ hashedPassword }).where(eq(users.username, username)).run();
    return result.changes;
  }

  async list(): Promise<UserRow[]> {
    return this.db.select().from(users).orderBy(asc(users.username)).all();
  }
}
