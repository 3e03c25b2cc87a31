/**
 * Opens the course index described by config.toml: the SQLite database at
 * storage.db_path and the configured embedding provider.
 */

import type Database from 'better-sqlite3';

import type { Config } from '../config/schema.js';
import { resolveDbPath } from '../config/loader.js';
import { openDatabase } from '../database/index.js';
import { createEmbeddingProvider } from '../indexer/embedder/index.js';
import type { ModelLoadProgress } from '../indexer/embedder/types.js';
import type { Logger } from '../utils/index.js';
import { CourseIndex } from './store.js';

export interface OpenCourseIndexOptions {
  /** Overrides storage.db_path */
  dbPath?: string;
  logger?: Logger;
  onModelLoad?: (progress: ModelLoadProgress) => void;
}

export interface OpenedCourseIndex {
  index: CourseIndex;
  db: Database.Database;
  /** Embedding model actually in use (primary or fallback) */
  embeddingModel: string;
  close(): void;
}

/**
 * @throws DatabaseError if the database cannot be opened
 * @throws IndexUnavailableError if no embedding provider is available
 */
export async function openCourseIndex(config: Config, options: OpenCourseIndexOptions = {}): Promise<OpenedCourseIndex> {
  const db = openDatabase(options.dbPath ?? resolveDbPath(config));

  try {
    const embedding = await createEmbeddingProvider(config.embedding, {
      logger: options.logger,
      onProgress: options.onModelLoad,
    });

    const index = new CourseIndex(db, embedding.provider, {
      model: embedding.model,
      batchSize: config.embedding.batch_size,
      timeout: config.embedding.timeout_ms,
      maxResults: config.search.max_results,
      logger: options.logger,
    });

    return { index, db, embeddingModel: embedding.model, close: () => db.close() };
  } catch (error) {
    db.close();
    throw error;
  }
}
