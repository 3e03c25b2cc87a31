/**
 * Search Module Types
 *
 * Types for the course index: stored courses, search filters and results.
 */

import type { Course } from '../indexer/chunker/types.js';
import type { Logger } from '../utils/index.js';

/**
 * Options for constructing a CourseIndex.
 */
export interface CourseIndexOptions {
  /** Embedding model name recorded with every stored course */
  model: string;
  /** Texts per embedding batch during upsert (default: 32) */
  batchSize?: number;
  /** Milliseconds one embedding call may take (default: 120000) */
  timeout?: number;
  /** Results returned when a search gives no limit (default: 5) */
  maxResults?: number;
  logger?: Logger;
}

export interface UpsertOptions {
  /** Document the course was read from, kept for `cqa courses` */
  sourcePath?: string;
  /** Fired after each embedding batch */
  onProgress?: (embedded: number, total: number) => void;
}

export interface UpsertResult {
  /** False when the title was already indexed (nothing was written) */
  added: boolean;
  /** Chunks stored for the course */
  chunkCount: number;
}

/**
 * Options for performing a search query.
 */
export interface SearchOptions {
  /** Approximate course name; resolved to an exact title first */
  courseName?: string;
  /** Only chunks of this lesson */
  lessonNumber?: number;
  /** Maximum results (default: the index's maxResults) */
  limit?: number;
}

/**
 * A matched chunk with its provenance.
 */
export interface CourseSearchResult {
  /** Chunk text, context prefix included */
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
  /** Lesson link, or the course link when the lesson has none */
  link?: string;
  /** Cosine similarity, higher = more similar */
  score: number;
}

/**
 * A course as stored in the index.
 */
export interface IndexedCourse extends Course {
  embeddingModel: string;
  sourcePath?: string;
  createdAt: string;
}

export interface CourseSummary {
  title: string;
  instructor?: string;
  lessonCount: number;
  chunkCount: number;
}

/**
 * Provenance attached to an answer.
 */
export interface AnswerSource {
  courseTitle: string;
  lessonNumber?: number;
  link?: string;
}
