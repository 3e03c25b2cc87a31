/**
 * Chunker Module
 *
 * ```typescript
 * import { chunkCourseFile } from './chunker/index.js';
 *
 * const { course, chunks } = await chunkCourseFile('docs/course1_script.txt', {
 *   chunkSize: 800,
 *   chunkOverlap: 100,
 * });
 * ```
 */

export { chunkDocument, chunkCourseFile, windowSentences } from './chunker.js';
export { parseCourseDocument } from './parser.js';
export { splitSentences } from './sentences.js';
export { DEFAULT_CHUNKING, MAX_DOCUMENT_SIZE, resolveChunkingOptions, contextPrefix } from './config.js';
export type {
  Course,
  Lesson,
  CourseChunk,
  LessonSection,
  ParsedDocument,
  ChunkedDocument,
  ChunkingOptions,
} from './types.js';
