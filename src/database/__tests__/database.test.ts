/**
 * Database Module Tests
 *
 * Connection, migrations and embedding BLOB conversion.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase, IN_MEMORY } from '../connection.js';
import { runMigrations, getPendingMigrations } from '../migrate.js';
import { embeddingToBlob, blobToEmbedding } from '../schema.js';

// ============================================================================
// openDatabase
// ============================================================================

describe('openDatabase', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'cqa-db-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('creates parent directories and the schema', () => {
    const dbPath = join(testDir, 'nested', 'courses.db');
    const db = openDatabase(dbPath);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => (row && typeof row === 'object' && 'name' in row ? row.name : null));
    db.close();

    expect(existsSync(dbPath)).toBe(true);
    expect(tables).toEqual(expect.arrayContaining(['_migrations', 'chunks', 'courses', 'lessons']));
  });

  it('enables foreign keys', () => {
    const db = openDatabase(IN_MEMORY);

    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    db.close();
  });

  it('reopens an existing database without reapplying migrations', () => {
    const dbPath = join(testDir, 'courses.db');
    openDatabase(dbPath).close();

    const db = openDatabase(dbPath);
    expect(getPendingMigrations(db)).toEqual([]);
    expect(runMigrations(db)).toEqual({ applied: [], failed: [] });
    db.close();
  });
});

// ============================================================================
// Migrations
// ============================================================================

describe('runMigrations', () => {
  it('applies the initial migration to an empty database', () => {
    const db = new Database(':memory:');

    expect(getPendingMigrations(db)).toEqual(['001-initial.sql']);
    expect(runMigrations(db)).toEqual({ applied: ['001-initial.sql'], failed: [] });
    db.close();
  });

  it('cascades course deletion to lessons and chunks', () => {
    const db = openDatabase(IN_MEMORY);
    const blob = embeddingToBlob([1, 0]);

    db.prepare(
      'INSERT INTO courses (title, title_embedding, embedding_model, embedding_dimensions) VALUES (?, ?, ?, ?)'
    ).run('Intro', blob, 'test-model', 2);
    db.prepare('INSERT INTO lessons (course_title, lesson_number, title) VALUES (?, ?, ?)').run('Intro', 0, 'Basics');
    db.prepare(
      'INSERT INTO chunks (course_title, lesson_number, chunk_index, content, embedding) VALUES (?, ?, ?, ?, ?)'
    ).run('Intro', 0, 0, 'text', blob);

    db.prepare('DELETE FROM courses WHERE title = ?').run('Intro');

    expect(db.prepare('SELECT COUNT(*) AS count FROM lessons').get()).toEqual({ count: 0 });
    expect(db.prepare('SELECT COUNT(*) AS count FROM chunks').get()).toEqual({ count: 0 });
    db.close();
  });

  it('rejects chunks for unknown courses', () => {
    const db = openDatabase(IN_MEMORY);

    expect(() =>
      db
        .prepare('INSERT INTO chunks (course_title, chunk_index, content, embedding) VALUES (?, ?, ?, ?)')
        .run('Missing', 0, 'text', embeddingToBlob([1]))
    ).toThrow(/FOREIGN KEY/);
    db.close();
  });

  it('rejects duplicate chunk indexes within a course', () => {
    const db = openDatabase(IN_MEMORY);
    const blob = embeddingToBlob([1]);
    db.prepare(
      'INSERT INTO courses (title, title_embedding, embedding_model, embedding_dimensions) VALUES (?, ?, ?, ?)'
    ).run('Intro', blob, 'test-model', 1);
    const insert = db.prepare(
      'INSERT INTO chunks (course_title, chunk_index, content, embedding) VALUES (?, ?, ?, ?)'
    );
    insert.run('Intro', 0, 'a', blob);

    expect(() => insert.run('Intro', 0, 'b', blob)).toThrow(/UNIQUE/);
    db.close();
  });
});

// ============================================================================
// Embedding BLOBs
// ============================================================================

describe('embedding BLOB conversion', () => {
  it('stores four bytes per dimension', () => {
    expect(embeddingToBlob([0.5, -1, 2]).byteLength).toBe(12);
  });

  it('reads back the stored values', () => {
    const restored = blobToEmbedding(embeddingToBlob(new Float32Array([0.5, -1, 2])));

    expect(Array.from(restored)).toEqual([0.5, -1, 2]);
  });

  it('reads buffers that are not 4-byte aligned', () => {
    const source = embeddingToBlob([0.25, 4]);
    const padded = Buffer.alloc(source.byteLength + 1);
    source.copy(padded, 1);

    expect(Array.from(blobToEmbedding(padded.subarray(1)))).toEqual([0.25, 4]);
  });

  it('survives a SQLite round trip', () => {
    const db = openDatabase(IN_MEMORY);
    db.prepare(
      'INSERT INTO courses (title, title_embedding, embedding_model, embedding_dimensions) VALUES (?, ?, ?, ?)'
    ).run('Intro', embeddingToBlob([0.125, 0.75]), 'test-model', 2);

    const row = db.prepare('SELECT title_embedding FROM courses').get();
    db.close();

    expect(row).toBeDefined();
    if (row && typeof row === 'object' && 'title_embedding' in row && Buffer.isBuffer(row.title_embedding)) {
      expect(Array.from(blobToEmbedding(row.title_embedding))).toEqual([0.125, 0.75]);
    } else {
      throw new Error('expected a BLOB column');
    }
  });
});
