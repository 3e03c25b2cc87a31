/**
 * Course Q&A Assistant - Library Entry Point
 *
 * The CLI (`cqa`) covers ingestion, questions and chat. This module exposes
 * the same pieces for embedding the assistant in another program.
 *
 * @example Answer a question from configuration
 * ```typescript
 * import { loadConfig, createCourseAssistant } from 'course-qa-assistant';
 *
 * const { assistant, close } = await createCourseAssistant(loadConfig());
 * try {
 *   await assistant.loadDocuments('./docs');
 *   const { answer, sources, sessionId } = await assistant.query('What is a vector index?');
 *   const followUp = await assistant.query('How is it built?', sessionId);
 * } finally {
 *   close();
 * }
 * ```
 *
 * @example Wire the parts by hand
 * ```typescript
 * import { CourseAssistant, CourseIndex, ConversationStore, openDatabase } from 'course-qa-assistant';
 *
 * const index = new CourseIndex(openDatabase('./courses.db'), embeddingProvider, { model: 'all-minilm' });
 * const assistant = new CourseAssistant({ index, model: chatModel, sessions: new ConversationStore(2) });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

// Assistant, agent loop and tools
export {
  CourseAssistant,
  createCourseAssistant,
  CourseAgent,
  ProviderChatModel,
  FALLBACK_ANSWER,
  MAX_TOOL_ROUNDS,
} from './agent/index.js';
export type {
  CourseAssistantOptions,
  AssistantHandle,
  CreateAssistantOptions,
  ChatModel,
  ModelMessage,
  ModelResponse,
  QueryResult,
  CourseStats,
  AgentResult,
  AgentState,
  LoadDocumentsOptions,
  LoadDocumentsResult,
} from './agent/index.js';

// Index and search
export { CourseIndex, listCourseSummaries, openCourseIndex, formatResults, formatSourceLabel } from './search/index.js';
export type {
  AnswerSource,
  CourseSearchResult,
  CourseSummary,
  IndexedCourse,
  SearchOptions,
  OpenedCourseIndex,
} from './search/index.js';

// Sessions
export { ConversationStore } from './session/index.js';
export type { Turn, TurnRole } from './session/index.js';

// Ingestion
export { chunkDocument, chunkCourseFile, parseCourseDocument, scanCourseDocuments, runIngestPipeline } from './indexer/index.js';
export type { Course, Lesson, CourseChunk, ChunkingOptions } from './indexer/index.js';

// Storage
export { openDatabase, IN_MEMORY } from './database/index.js';

// Configuration
export { loadConfig, writeDefaultConfig, resolveDbPath, DEFAULT_CONFIG } from './config/index.js';
export type { Config } from './config/index.js';

// Providers
export { createLLMProvider, AllProvidersFailedError } from './providers/index.js';

// Errors
export * from './errors/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
