/**
 * Chunker Configuration
 */

import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';
import type { ChunkingOptions } from './types.js';

export const DEFAULT_CHUNKING: ChunkingOptions = {
  chunkSize: 800,
  chunkOverlap: 100,
};

/** Documents larger than this are skipped by the scanner (10MB) */
export const MAX_DOCUMENT_SIZE = 10 * 1024 * 1024;

const ChunkingOptionsSchema = z
  .object({
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
  })
  .refine((o) => o.chunkOverlap < o.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

/**
 * Fill in defaults and validate chunking options.
 *
 * @throws ValidationError
 */
export function resolveChunkingOptions(options: Partial<ChunkingOptions> = {}): ChunkingOptions {
  const result = ChunkingOptionsSchema.safeParse({ ...DEFAULT_CHUNKING, ...options });
  if (!result.success) {
    throw new ValidationError(
      'Invalid chunking options',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * The context string every chunk starts with.
 *
 * @example
 * ```ts
 * contextPrefix('Intro', 0); // "Course Intro Lesson 0 content: "
 * ```
 */
export function contextPrefix(courseTitle: string, lessonNumber?: number): string {
  return lessonNumber === undefined
    ? `Course ${courseTitle} content: `
    : `Course ${courseTitle} Lesson ${lessonNumber} content: `;
}
