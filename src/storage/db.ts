/**
 * Database Connection Factory
 *
 * Opens the on-device SQLite database through better-sqlite3, applies the
 * schema and wraps the connection with Drizzle ORM.
 *
 * There is no default instance: the container opens the database from
 * configuration and hands it to the repositories that need it.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *
 *   const { db, sqlite } = createDatabase('./data/knowledge-points.db');
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { applySchema } from './migrate';

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countGuests(database: AppDatabase) {
 *   return database.select().from(guestKnowledgePoints);
 * }
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * An open database: the Drizzle handle plus the raw connection it wraps,
 * which the owner closes on shutdown.
 */
export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Wraps an already open connection: applies the schema and returns the
 * Drizzle handle.
 */
export function wrapConnection(sqlite: Database.Database): DatabaseHandle {
  // WAL lets readers proceed while the single writer commits
  sqlite.pragma('journal_mode = WAL');
  applySchema(sqlite);
  return { db: drizzle(sqlite, { schema }), sqlite };
}

/**
 * Opens (or creates) the database file at `dbPath`.
 *
 * @param dbPath - Path to the SQLite file, or ':memory:' for tests
 */
export function createDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  return wrapConnection(new Database(dbPath));
}
