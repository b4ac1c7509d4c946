import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type AuthDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AuthDatabase;
  close: () => void;
}

const SCHEMA_URL = new URL('../sql/schema.sql', import.meta.url);

/**
 * Open (or create) the SQLite database and apply the schema.
 *
 * `:memory:` gives a private database per call, which is what tests use.
 */
export function createDatabase(filename = ':memory:'): DatabaseHandle {
  const sqlite = new Database(filename);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(readFileSync(SCHEMA_URL, 'utf8'));

  const db = drizzle(sqlite, { schema });

  return {
    db,
    close: () => sqlite.close(),
  };
}
