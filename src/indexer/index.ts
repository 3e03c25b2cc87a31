/**
 * Indexer Module
 *
 * Turns course documents into stored, embedded chunks.
 *
 * @example
 * ```ts
 * import { scanCourseDocuments, runIngestPipeline } from './indexer/index.js';
 *
 * const paths = await scanCourseDocuments('./docs');
 * const result = await runIngestPipeline({ index, paths });
 * ```
 */

export { scanCourseDocuments, DEFAULT_DOCUMENT_EXTENSIONS, type ScanOptions } from './scanner.js';
export {
  runIngestPipeline,
  type IngestPipelineOptions,
} from './pipeline.js';

export {
  chunkDocument,
  chunkCourseFile,
  parseCourseDocument,
  splitSentences,
  windowSentences,
  contextPrefix,
  resolveChunkingOptions,
  DEFAULT_CHUNKING,
  MAX_DOCUMENT_SIZE,
  type Course,
  type Lesson,
  type CourseChunk,
  type ChunkedDocument,
  type ChunkingOptions,
} from './chunker/index.js';

export {
  createEmbeddingProvider,
  getModelDimensions,
  embedTexts,
  embedText,
  EmbeddingTimeoutError,
  type EmbeddingConfig,
  type EmbedderOptions,
  type ProviderOptions,
  type ModelLoadProgress,
  type EmbeddingProviderResult,
} from './embedder/index.js';
