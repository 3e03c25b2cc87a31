/**
 * Course Index
 *
 * Stores courses, lessons and embedded chunks in SQLite and answers
 * similarity queries over them. Vectors are kept as Float32 BLOBs and scored
 * in-process with cosine similarity after the SQL metadata filters run.
 *
 * @example
 * ```typescript
 * const index = new CourseIndex(openDatabase(getDbPath()), provider, { model });
 * await index.upsert(course, chunks);
 * const results = await index.search('what is a vector?', { courseName: 'intro', limit: 5 });
 * ```
 */

import type Database from 'better-sqlite3';
import type { EmbeddingProvider } from '@contextaisdk/rag';

import { embeddingToBlob, blobToEmbedding } from '../database/schema.js';
import {
  ChunkSearchRowSchema,
  CountRowSchema,
  CourseRowSchema,
  CourseSummaryRowSchema,
  LessonRowSchema,
  TitleRowSchema,
  validateRow,
  validateRows,
  type CourseRow,
} from '../database/validation.js';
import {
  CLIError,
  IndexUnavailableError,
  InvalidFilterError,
  NoCourseMatchError,
  ValidationError,
  toError,
} from '../errors/index.js';
import { embedText, embedTexts, DEFAULT_BATCH_SIZE, DEFAULT_EMBEDDING_TIMEOUT_MS } from '../indexer/embedder/embedder.js';
import type { Course, CourseChunk } from '../indexer/chunker/types.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { cosineSimilarity } from './similarity.js';
import type {
  CourseIndexOptions,
  CourseSearchResult,
  CourseSummary,
  IndexedCourse,
  SearchOptions,
  UpsertOptions,
  UpsertResult,
} from './types.js';

/** Results returned when neither the call nor the index sets a limit */
export const DEFAULT_MAX_RESULTS = 5;

/**
 * Keep CLIErrors (they already carry a code and hint); anything else from
 * SQLite or the embedding provider becomes IndexUnavailableError.
 */
function asIndexError(action: string, error: unknown): Error {
  if (error instanceof CLIError) {
    return error;
  }
  const cause = toError(error);
  return new IndexUnavailableError(`${action} failed: ${cause.message}`, cause);
}

/**
 * Every indexed course with its lesson and chunk counts, sorted by title.
 * Reads the database only, so no embedding provider is needed.
 *
 * @throws IndexUnavailableError if the query fails
 */
export function listCourseSummaries(db: Database.Database): CourseSummary[] {
  let rows: unknown[];
  try {
    rows = db
      .prepare(
        `SELECT c.title, c.instructor,
           (SELECT COUNT(*) FROM lessons l WHERE l.course_title = c.title) AS lesson_count,
           (SELECT COUNT(*) FROM chunks k WHERE k.course_title = c.title) AS chunk_count
         FROM courses c
         ORDER BY c.title`
      )
      .all();
  } catch (error) {
    throw asIndexError('Listing courses', error);
  }
  return validateRows(CourseSummaryRowSchema, rows, 'courses').map((row) => ({
    title: row.title,
    instructor: row.instructor ?? undefined,
    lessonCount: row.lesson_count,
    chunkCount: row.chunk_count,
  }));
}

function toIndexedCourse(row: CourseRow, lessons: Course['lessons']): IndexedCourse {
  return {
    title: row.title,
    link: row.link ?? undefined,
    instructor: row.instructor ?? undefined,
    lessons,
    embeddingModel: row.embedding_model,
    sourcePath: row.source_path ?? undefined,
    createdAt: row.created_at,
  };
}

export class CourseIndex {
  /** Upserts in progress, by course title */
  private pending = new Map<string, Promise<UpsertResult>>();

  private readonly model: string;
  private readonly batchSize: number;
  private readonly timeout: number;
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(
    private readonly db: Database.Database,
    private readonly provider: EmbeddingProvider,
    options: CourseIndexOptions
  ) {
    this.model = options.model;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.timeout = options.timeout ?? DEFAULT_EMBEDDING_TIMEOUT_MS;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.logger = options.logger ?? consoleLogger;
  }

  // ==========================================================================
  // Write path
  // ==========================================================================

  /**
   * Store a course and its chunks unless the title is already indexed.
   *
   * A second upsert of a title that is still being written waits for the
   * first and reports `added: false`.
   */
  async upsert(course: Course, chunks: CourseChunk[], options: UpsertOptions = {}): Promise<UpsertResult> {
    const foreign = chunks.find((chunk) => chunk.courseTitle !== course.title);
    if (foreign) {
      throw new ValidationError(
        `Chunk ${foreign.index} belongs to '${foreign.courseTitle}', not '${course.title}'`
      );
    }

    const inFlight = this.pending.get(course.title);
    if (inFlight) {
      const result = await inFlight;
      return { ...result, added: false };
    }

    if (this.hasCourse(course.title)) {
      return { added: false, chunkCount: this.getChunkCount(course.title) };
    }

    const operation = this.insert(course, chunks, options);
    this.pending.set(course.title, operation);
    try {
      return await operation;
    } finally {
      this.pending.delete(course.title);
    }
  }

  private async insert(course: Course, chunks: CourseChunk[], options: UpsertOptions): Promise<UpsertResult> {
    let titleVector: Float32Array;
    let chunkVectors: Float32Array[];
    try {
      titleVector = await embedText(this.provider, course.title, this.timeout);
      chunkVectors = await embedTexts(
        this.provider,
        chunks.map((chunk) => chunk.text),
        { batchSize: this.batchSize, timeout: this.timeout, onProgress: options.onProgress }
      );
    } catch (error) {
      throw asIndexError(`Embedding course '${course.title}'`, error);
    }

    this.assertDimensions(titleVector.length);

    const insertCourse = this.db.prepare(
      `INSERT INTO courses (title, link, instructor, title_embedding, embedding_model, embedding_dimensions, source_path)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    const insertLesson = this.db.prepare(
      'INSERT INTO lessons (course_title, lesson_number, title, link) VALUES (?, ?, ?, ?)'
    );
    const insertChunk = this.db.prepare(
      'INSERT INTO chunks (course_title, lesson_number, chunk_index, content, embedding) VALUES (?, ?, ?, ?, ?)'
    );

    // Re-checked inside the transaction: another connection may have written the title meanwhile
    const write = this.db.transaction((): boolean => {
      if (this.hasCourse(course.title)) {
        return false;
      }
      insertCourse.run(
        course.title,
        course.link ?? null,
        course.instructor ?? null,
        embeddingToBlob(titleVector),
        this.model,
        titleVector.length,
        options.sourcePath ?? null
      );
      for (const lesson of course.lessons) {
        insertLesson.run(course.title, lesson.number, lesson.title, lesson.link ?? null);
      }
      chunks.forEach((chunk, i) => {
        insertChunk.run(
          course.title,
          chunk.lessonNumber ?? null,
          chunk.index,
          chunk.text,
          embeddingToBlob(chunkVectors[i] ?? new Float32Array(0))
        );
      });
      return true;
    });

    const added = this.guard(`Storing course '${course.title}'`, () => write());
    if (!added) {
      return { added: false, chunkCount: this.getChunkCount(course.title) };
    }

    this.logger.debug?.(`Indexed '${course.title}': ${chunks.length} chunks`);
    return { added: true, chunkCount: chunks.length };
  }

  /**
   * Vectors of different sizes cannot be compared; refuse to mix models.
   */
  private assertDimensions(dimensions: number): void {
    const row = this.guard('Reading index metadata', () =>
      this.db.prepare('SELECT * FROM courses LIMIT 1').get()
    );
    if (row === undefined) {
      return;
    }
    const existing = validateRow(CourseRowSchema, row, 'courses');
    if (existing.embedding_dimensions !== dimensions) {
      throw new IndexUnavailableError(
        `the index holds ${existing.embedding_dimensions}-dimension embeddings (${existing.embedding_model}) ` +
          `but ${this.model} produces ${dimensions}; re-run: cqa ingest --clear`
      );
    }
  }

  /**
   * Delete a course with its lessons and chunks.
   *
   * @returns false when the title was not indexed
   */
  deleteCourse(title: string): boolean {
    const result = this.guard(`Deleting course '${title}'`, () =>
      this.db.prepare('DELETE FROM courses WHERE title = ?').run(title)
    );
    return result.changes > 0;
  }

  /**
   * Delete every course.
   *
   * @returns Number of courses removed
   */
  clear(): number {
    const result = this.guard('Clearing the index', () => this.db.prepare('DELETE FROM courses').run());
    return result.changes;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Map an approximate course name to an indexed title: an exact match
   * (then a case-insensitive one) wins, otherwise the title whose embedding
   * is nearest to the name. Any indexed course can be the nearest; there is
   * no minimum similarity.
   *
   * @throws NoCourseMatchError when the index holds no courses
   */
  async resolveCourseName(name: string): Promise<string> {
    const exact = this.guard(
      'Resolving course name',
      () =>
        this.db.prepare('SELECT title FROM courses WHERE title = ?').get(name) ??
        this.db.prepare('SELECT title FROM courses WHERE title = ? COLLATE NOCASE ORDER BY title').get(name)
    );
    if (exact !== undefined) {
      return validateRow(TitleRowSchema, exact, 'courses.title').title;
    }

    const rows = validateRows(
      CourseRowSchema,
      this.guard('Resolving course name', () => this.db.prepare('SELECT * FROM courses ORDER BY title').all()),
      'courses'
    );
    if (rows.length === 0) {
      throw new NoCourseMatchError(name);
    }

    const vector = await this.embed(name);
    let best = rows[0];
    let bestScore = -Infinity;
    for (const row of rows) {
      const score = this.similarity(vector, blobToEmbedding(row.title_embedding));
      if (score > bestScore) {
        best = row;
        bestScore = score;
      }
    }

    const title = best?.title ?? '';
    this.logger.debug?.(`Resolved course name '${name}' to '${title}' (${bestScore.toFixed(3)})`);
    return title;
  }

  /**
   * Chunks most similar to `query`, best first.
   *
   * @throws InvalidFilterError when `courseName` matches no course
   */
  async search(query: string, options: SearchOptions = {}): Promise<CourseSearchResult[]> {
    const limit = options.limit ?? this.maxResults;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Search limit must be a positive integer, got ${limit}`);
    }

    let courseTitle: string | undefined;
    if (options.courseName !== undefined) {
      try {
        courseTitle = await this.resolveCourseName(options.courseName);
      } catch (error) {
        if (error instanceof NoCourseMatchError) {
          throw new InvalidFilterError(options.courseName);
        }
        throw error;
      }
    }

    const rows = validateRows(
      ChunkSearchRowSchema,
      this.guard('Searching chunks', () =>
        this.db
          .prepare(
            `SELECT c.course_title, c.lesson_number, c.chunk_index, c.content, c.embedding,
                    l.link AS lesson_link, co.link AS course_link
             FROM chunks c
             JOIN courses co ON co.title = c.course_title
             LEFT JOIN lessons l ON l.course_title = c.course_title AND l.lesson_number = c.lesson_number
             WHERE (@course IS NULL OR c.course_title = @course)
               AND (@lesson IS NULL OR c.lesson_number = @lesson)`
          )
          .all({ course: courseTitle ?? null, lesson: options.lessonNumber ?? null })
      ),
      'chunks'
    );
    if (rows.length === 0) {
      return [];
    }

    const vector = await this.embed(query);
    const scored: CourseSearchResult[] = rows.map((row) => ({
      content: row.content,
      courseTitle: row.course_title,
      lessonNumber: row.lesson_number ?? undefined,
      chunkIndex: row.chunk_index,
      link: row.lesson_link ?? row.course_link ?? undefined,
      score: this.similarity(vector, blobToEmbedding(row.embedding)),
    }));

    scored.sort(
      (a, b) =>
        b.score - a.score || a.courseTitle.localeCompare(b.courseTitle) || a.chunkIndex - b.chunkIndex
    );
    return scored.slice(0, limit);
  }

  private async embed(text: string): Promise<Float32Array> {
    try {
      return await embedText(this.provider, text, this.timeout);
    } catch (error) {
      throw asIndexError('Embedding query', error);
    }
  }

  private similarity(query: Float32Array, stored: Float32Array): number {
    if (query.length !== stored.length) {
      throw new IndexUnavailableError(
        `the index holds ${stored.length}-dimension embeddings but ${this.model} produces ${query.length}; ` +
          're-run: cqa ingest --clear'
      );
    }
    return cosineSimilarity(query, stored);
  }

  // ==========================================================================
  // Read helpers
  // ==========================================================================

  /** Indexed titles, sorted */
  getCourseTitles(): string[] {
    const rows = this.guard('Listing courses', () =>
      this.db.prepare('SELECT title FROM courses ORDER BY title').all()
    );
    return validateRows(TitleRowSchema, rows, 'courses').map((row) => row.title);
  }

  getCourseCount(): number {
    return this.count('SELECT COUNT(*) AS count FROM courses');
  }

  hasCourse(title: string): boolean {
    return this.count('SELECT COUNT(*) AS count FROM courses WHERE title = ?', title) > 0;
  }

  /**
   * @param title - Counts every chunk when omitted
   */
  getChunkCount(title?: string): number {
    return title === undefined
      ? this.count('SELECT COUNT(*) AS count FROM chunks')
      : this.count('SELECT COUNT(*) AS count FROM chunks WHERE course_title = ?', title);
  }

  /**
   * A stored course with its lessons in lesson-number order.
   */
  getCourse(title: string): IndexedCourse | undefined {
    const row = this.guard('Reading course', () =>
      this.db.prepare('SELECT * FROM courses WHERE title = ?').get(title)
    );
    if (row === undefined) {
      return undefined;
    }
    const course = validateRow(CourseRowSchema, row, `courses.title=${title}`);

    const lessons = validateRows(
      LessonRowSchema,
      this.guard('Reading lessons', () =>
        this.db.prepare('SELECT * FROM lessons WHERE course_title = ? ORDER BY lesson_number').all(title)
      ),
      `lessons.course_title=${title}`
    ).map((lesson) => ({
      number: lesson.lesson_number,
      title: lesson.title,
      link: lesson.link ?? undefined,
    }));

    return toIndexedCourse(course, lessons);
  }

  getLessonLink(title: string, lessonNumber: number): string | undefined {
    const row = this.guard('Reading lesson', () =>
      this.db.prepare('SELECT * FROM lessons WHERE course_title = ? AND lesson_number = ?').get(title, lessonNumber)
    );
    if (row === undefined) {
      return undefined;
    }
    return validateRow(LessonRowSchema, row, `lessons.course_title=${title}`).link ?? undefined;
  }

  private count(sql: string, ...params: string[]): number {
    const row = this.guard('Counting rows', () => this.db.prepare(sql).get(...params));
    return validateRow(CountRowSchema, row, 'count').count;
  }

  private guard<T>(action: string, operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw asIndexError(action, error);
    }
  }
}
