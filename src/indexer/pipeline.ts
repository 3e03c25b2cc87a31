/**
 * Ingest Pipeline
 *
 * Chunk → Embed → Store, one document at a time. A malformed document is
 * reported and skipped; the rest of the batch still loads. Failures of the
 * index itself (embedding backend, SQLite) stop the run.
 */

import { chunkCourseFile } from './chunker/index.js';
import type { ChunkingOptions } from './chunker/types.js';
import { IndexUnavailableError, IngestCancelledError, MalformedDocumentError, toError } from '../errors/index.js';
import type { CourseIndex } from '../search/store.js';
import type { LoadDocumentsResult } from '../agent/types.js';

export interface IngestPipelineOptions {
  index: CourseIndex;
  /** Documents to load, in order */
  paths: string[];
  chunking?: Partial<ChunkingOptions>;

  /** Delete every indexed course before the first document */
  clearExisting?: boolean;

  /**
   * Checked between documents. Courses already stored stay stored.
   */
  signal?: AbortSignal;

  onDocumentStart?: (path: string, position: number, total: number) => void;
  onEmbedProgress?: (path: string, embedded: number, total: number) => void;
  onWarning?: (message: string, path: string) => void;
  /** Number of courses removed by `clearExisting` */
  onCleared?: (removed: number) => void;
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IngestCancelledError();
  }
}

/**
 * Load documents into the index.
 *
 * @example
 * ```typescript
 * const result = await runIngestPipeline({
 *   index,
 *   paths: await scanCourseDocuments('./docs'),
 *   chunking: { chunkSize: 800, chunkOverlap: 100 },
 *   onWarning: (msg) => ctx.warn(msg),
 * });
 * console.log(`${result.coursesAdded} courses, ${result.chunksAdded} chunks`);
 * ```
 */
export async function runIngestPipeline(options: IngestPipelineOptions): Promise<LoadDocumentsResult> {
  const { index, paths, chunking, signal, onDocumentStart, onEmbedProgress, onWarning } = options;
  const result: LoadDocumentsResult = { coursesAdded: 0, chunksAdded: 0, skipped: [], failed: [] };

  if (options.clearExisting) {
    options.onCleared?.(index.clear());
  }

  for (const [i, path] of paths.entries()) {
    checkCancelled(signal);
    onDocumentStart?.(path, i + 1, paths.length);

    try {
      const { course, chunks } = await chunkCourseFile(path, chunking);

      if (index.hasCourse(course.title)) {
        result.skipped.push(path);
        continue;
      }

      const upsert = await index.upsert(course, chunks, {
        sourcePath: path,
        onProgress: (embedded, total) => onEmbedProgress?.(path, embedded, total),
      });

      if (upsert.added) {
        result.coursesAdded++;
        result.chunksAdded += upsert.chunkCount;
      } else {
        result.skipped.push(path);
      }
    } catch (error) {
      if (error instanceof IndexUnavailableError) {
        throw error;
      }
      const message = toError(error).message;
      result.failed.push({ path, error: message });
      onWarning?.(error instanceof MalformedDocumentError ? message : `Failed to load ${path}: ${message}`, path);
    }
  }

  return result;
}
