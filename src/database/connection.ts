/**
 * Database Connection Module
 *
 * Opens a better-sqlite3 connection and brings its schema up to date. The
 * caller owns the returned handle and closes it.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError, toError } from '../errors/index.js';
import { runMigrations } from './migrate.js';

/** Path that opens a private in-memory database */
export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the course index database.
 *
 * @example
 * ```ts
 * const db = openDatabase(getDbPath());
 * try {
 *   // ...
 * } finally {
 *   db.close();
 * }
 * ```
 * @throws DatabaseError if the file cannot be opened or migrated
 */
export function openDatabase(path: string): Database.Database {
  let db: Database.Database;
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
  } catch (error) {
    throw new DatabaseError(`Cannot open database at ${path}`, toError(error));
  }

  // Foreign keys are OFF by default in SQLite
  db.pragma('foreign_keys = ON');
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  const result = runMigrations(db);
  if (result.failed.length > 0) {
    db.close();
    const details = result.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
    throw new DatabaseError(`Database migration failed (${details})`);
  }

  return db;
}
