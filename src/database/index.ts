/**
 * Database Module
 *
 * SQLite storage for the course index (better-sqlite3).
 */

export { openDatabase, IN_MEMORY } from './connection.js';
export { runMigrations, getPendingMigrations, type MigrationResult } from './migrate.js';
export { embeddingToBlob, blobToEmbedding } from './schema.js';
export {
  CourseRowSchema,
  LessonRowSchema,
  ChunkSearchRowSchema,
  CountRowSchema,
  TitleRowSchema,
  CourseSummaryRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  type CourseRow,
  type LessonRow,
  type ChunkSearchRow,
  type CourseSummaryRow,
} from './validation.js';
