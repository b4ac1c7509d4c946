import { EVENT_NAMES, TOKEN_KINDS } from '@gatehouse/types';
import { index, integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// DDL lives in sql/schema.sql; keep both in step.

export const users = sqliteTable('users', {
  username: text('username').primaryKey(),
  hashedPassword: text('hashed_password').notNull(),
  fullName: text('full_name').notNull(),
  email: text('email').notNull().unique(),
  admin: integer('admin', { mode: 'boolean' }).notNull().default(false),
  confirmed: integer('confirmed', { mode: 'boolean' }).notNull().default(false),
  created: integer('created', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
});

export const tokens = sqliteTable(
  'tokens',
  {
    hashedValue: text('hashed_value').notNull(),
    kind: text('kind', { enum: TOKEN_KINDS }).notNull(),
    expires: integer('expires', { mode: 'timestamp_ms' }).notNull(),
    username: text('username')
      .notNull()
      .references(() => users.username),
  },
  (table) => [
    primaryKey({ columns: [table.hashedValue, table.kind] }),
    index('idx_tokens_username').on(table.username),
  ]
);

export const events = sqliteTable(
  'events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name', { enum: EVENT_NAMES }).notNull(),
    success: integer('success', { mode: 'boolean' }).notNull(),
    username: text('username').notNull().default(''),
    message: text('message').notNull().default(''),
    created: integer('created', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [index('idx_events_username_name').on(table.username, table.name)]
);

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
export type TokenRow = typeof tokens.$inferSelect;
export type NewTokenRow = typeof tokens.$inferInsert;
export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;
