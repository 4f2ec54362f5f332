/**
 * Schema Bootstrap
 *
 * Brings an SQLite database up to the current schema at open time. Every
 * statement is idempotent and only creates what is missing.
 *
 * The DDL here mirrors `schema.ts` and must be kept in step with it.
 */

import type Database from 'better-sqlite3';

const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS guest_knowledge_points (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    category TEXT NOT NULL,
    subcategory TEXT NOT NULL DEFAULT '',
    correct_phrase TEXT NOT NULL,
    explanation TEXT,
    user_context_sentence TEXT,
    incorrect_phrase_in_context TEXT,
    key_point_summary TEXT,
    mastery_level REAL NOT NULL DEFAULT 0,
    mistake_count INTEGER NOT NULL DEFAULT 0,
    correct_count INTEGER NOT NULL DEFAULT 0,
    review_streak INTEGER NOT NULL DEFAULT 0,
    next_review_date INTEGER,
    last_ai_review_date INTEGER,
    ai_review_notes TEXT,
    is_archived INTEGER NOT NULL DEFAULT 0,
    promotion_attempts INTEGER NOT NULL DEFAULT 0,
    last_promotion_error TEXT,
    last_promotion_attempt_at INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS guest_knowledge_points_content_idx
    ON guest_knowledge_points (category, correct_phrase)`,
  `CREATE TABLE IF NOT EXISTS cached_knowledge_points (
    effective_id TEXT PRIMARY KEY,
    is_archived INTEGER NOT NULL,
    position INTEGER NOT NULL,
    payload TEXT NOT NULL,
    cached_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS cached_knowledge_points_archived_idx
    ON cached_knowledge_points (is_archived)`,
  `CREATE TABLE IF NOT EXISTS sync_state (
    id TEXT PRIMARY KEY,
    last_run_at INTEGER,
    last_success_at INTEGER
  )`,
];

/**
 * Applies the schema inside a single transaction.
 *
 * @param sqlite - An open better-sqlite3 connection
 */
export function applySchema(sqlite: Database.Database): void {
  const apply = sqlite.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) {
      sqlite.exec(statement);
    }
  });
  apply();
}

/**
 * Names of the application tables present in the database, sorted.
 * Used by the health check and the tests.
 */
export function listTables(sqlite: Database.Database): string[] {
  const rows = sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();
  return rows.map((row) => row.name);
}
