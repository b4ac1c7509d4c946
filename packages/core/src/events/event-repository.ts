/**
 * Event Repository
 *
 * Append-only access to the events table.
 */

import { and, desc, eq } from 'drizzle-orm';
import { events, type AuthDatabase, type NewEventRow } from '@gatehouse/database';
import type { AuthEvent, LoginRecord } from './event-types.js';

export class EventRepository {
  constructor(private db: AuthDatabase) {}

  async insert(data: NewEventRow): Promise<void> {
    this.db.insert(events).values(data).run();
  }

  /**
   * Second most recent login event for a user; the most recent one is the
   * login that created the current session.
   */
  async findPreviousLogin(username: string): Promise<LoginRecord | null> {
    const row = this.db
      .select({ created: events.created, success: events.success })
      .from(events)
      .where(and(eq(events.username, username), eq(events.name, 'login')))
      .orderBy(desc(events.created), desc(events.id))
      .limit(1)
      .offset(1)
      .get();
    return row ?? null;
  }

  async list(): Promise<AuthEvent[]> {
    return this.db.select().from(events).orderBy(desc(events.created), desc(events.id)).all();
  }
}
