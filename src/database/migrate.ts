/**
 * Database Migration Runner
 *
 * Applies the embedded SQL migrations in order, recording each in
 * `_migrations`. Running it again on a migrated database is a no-op.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { validateRows } from './validation.js';

export interface MigrationResult {
  /** Names of migrations applied by this run */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded as strings so the build output needs no data files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Courses: one row per ingested document, keyed by title
CREATE TABLE IF NOT EXISTS courses (
  title TEXT PRIMARY KEY,
  link TEXT,
  instructor TEXT,
  title_embedding BLOB NOT NULL,
  embedding_model TEXT NOT NULL,
  embedding_dimensions INTEGER NOT NULL,
  source_path TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS lessons (
  course_title TEXT NOT NULL,
  lesson_number INTEGER NOT NULL,
  title TEXT NOT NULL,
  link TEXT,
  PRIMARY KEY (course_title, lesson_number),
  FOREIGN KEY (course_title) REFERENCES courses(title) ON DELETE CASCADE
);

-- Chunks: chunk_index orders chunks within a course
CREATE TABLE IF NOT EXISTS chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  course_title TEXT NOT NULL,
  lesson_number INTEGER,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  UNIQUE (course_title, chunk_index),
  FOREIGN KEY (course_title) REFERENCES courses(title) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_chunks_course_lesson ON chunks(course_title, lesson_number);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations.
 *
 * Failed migrations do not stop later ones from being attempted; callers
 * decide whether a non-empty `failed` list is fatal.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = new Set(
    validateRows(MigrationNameRowSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations').map(
      (row) => row.name
    )
  );

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Names of migrations not yet applied to this database
 */
export function getPendingMigrations(db: Database.Database): string[] {
  const tableExists = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'").get();
  if (!tableExists) {
    return MIGRATIONS.map((m) => m.name);
  }

  const applied = new Set(
    validateRows(MigrationNameRowSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations').map(
      (row) => row.name
    )
  );
  return MIGRATIONS.filter((m) => !applied.has(m.name)).map((m) => m.name);
}
