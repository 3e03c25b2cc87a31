/**
 * Database Row Validation
 *
 * Zod schemas for rows read back from SQLite. better-sqlite3 returns
 * `unknown` rows; validating them catches schema drift (a failed migration,
 * a hand-edited file) at the read instead of deep inside a search.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM courses WHERE title = ?').get(title);
 * return row ? validateRow(CourseRowSchema, row, `courses.title=${title}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const CourseRowSchema = z.object({
  title: z.string(),
  link: z.string().nullable(),
  instructor: z.string().nullable(),
  title_embedding: z.instanceof(Buffer),
  embedding_model: z.string(),
  embedding_dimensions: z.number().int().positive(),
  source_path: z.string().nullable(),
  created_at: z.string(),
});

export type CourseRow = z.infer<typeof CourseRowSchema>;

export const LessonRowSchema = z.object({
  course_title: z.string(),
  lesson_number: z.number().int().nonnegative(),
  title: z.string(),
  link: z.string().nullable(),
});

export type LessonRow = z.infer<typeof LessonRowSchema>;

/**
 * Columns loaded for similarity search (a chunk joined with its lesson link)
 */
export const ChunkSearchRowSchema = z.object({
  course_title: z.string(),
  lesson_number: z.number().int().nullable(),
  chunk_index: z.number().int().nonnegative(),
  content: z.string(),
  embedding: z.instanceof(Buffer),
  lesson_link: z.string().nullable(),
  course_link: z.string().nullable(),
});

export type ChunkSearchRow = z.infer<typeof ChunkSearchRowSchema>;

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

export const TitleRowSchema = z.object({
  title: z.string(),
});

/**
 * A course with its lesson and chunk counts (courses listing)
 */
export const CourseSummaryRowSchema = z.object({
  title: z.string(),
  instructor: z.string().nullable(),
  lesson_count: z.number().int().nonnegative(),
  chunk_count: z.number().int().nonnegative(),
});

export type CourseSummaryRow = z.infer<typeof CourseSummaryRowSchema>;

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * A database row did not match the expected schema.
 *
 * Exit code 5 (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nDelete the database file and re-run: cqa ingest`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row.
 *
 * @param context - Shown in the error, e.g. "courses.title=Intro"
 * @throws SchemaValidationError
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row; the first invalid one throws.
 */
export function validateRows<T extends z.ZodTypeAny>(schema: T, rows: unknown[], context: string): Array<z.output<T>> {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
