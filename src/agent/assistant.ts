/**
 * Course Assistant
 *
 * Composes the course index, the conversation store and the agent loop. One
 * instance serves many sessions; everything it holds is passed in.
 *
 * @example
 * ```typescript
 * const assistant = new CourseAssistant({ index, model });
 * await assistant.loadDocuments('./docs');
 *
 * const first = await assistant.query('What does lesson 1 of Building Vector Search cover?');
 * const followUp = await assistant.query('And lesson 2?', first.sessionId);
 * ```
 */

import { runIngestPipeline, scanCourseDocuments } from '../indexer/index.js';
import type { ChunkingOptions } from '../indexer/chunker/types.js';
import type { CourseIndex } from '../search/store.js';
import { DEFAULT_MAX_RESULTS } from '../search/store.js';
import { ConversationStore } from '../session/store.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { CourseAgent } from './agent-loop.js';
import type { ChatModel } from './model.js';
import { createCourseOutlineTool, createSearchCourseContentTool, ToolRegistry } from './tools/index.js';
import type {
  AgentResult,
  CourseStats,
  LoadDocumentsOptions,
  LoadDocumentsResult,
  QueryResult,
} from './types.js';

export interface CourseAssistantOptions {
  index: CourseIndex;
  model: ChatModel;
  /** Defaults to a store keeping 2 exchanges per session */
  sessions?: ConversationStore;
  /** Results per search tool call */
  maxResults?: number;
  maxTokens?: number;
  temperature?: number;
  chunking?: Partial<ChunkingOptions>;
  logger?: Logger;
}

export class CourseAssistant {
  readonly index: CourseIndex;
  readonly sessions: ConversationStore;
  private readonly agent: CourseAgent;
  private readonly chunking: Partial<ChunkingOptions>;
  private readonly logger: Logger;

  constructor(options: CourseAssistantOptions) {
    this.index = options.index;
    this.sessions = options.sessions ?? new ConversationStore();
    this.chunking = options.chunking ?? {};
    this.logger = options.logger ?? consoleLogger;

    const tools = new ToolRegistry()
      .register(createSearchCourseContentTool(this.index, { maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS }))
      .register(createCourseOutlineTool(this.index));

    this.agent = new CourseAgent({
      model: options.model,
      tools,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      logger: this.logger,
    });
  }

  /**
   * Answer a question within a session. A missing or unknown session id
   * starts a fresh session. History is recorded only once an answer exists.
   *
   * @throws ModelUnavailableError; the session is left unchanged
   */
  async query(text: string, sessionId?: string): Promise<QueryResult> {
    const id = sessionId ?? this.sessions.newSessionId();
    const result: AgentResult = await this.agent.run(text, this.sessions.getHistory(id));

    this.sessions.appendExchange(id, text, result.answer);
    return { answer: result.answer, sources: result.sources, sessionId: id };
  }

  getCourseStats(): CourseStats {
    const courseTitles = this.index.getCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }

  /**
   * Load every course document under `directory`.
   *
   * @throws FileNotFoundError if the directory does not exist
   * @throws IndexUnavailableError if the embedding backend or database fails
   */
  async loadDocuments(directory: string, options: LoadDocumentsOptions = {}): Promise<LoadDocumentsResult> {
    return runIngestPipeline({
      index: this.index,
      paths: await scanCourseDocuments(directory),
      chunking: this.chunking,
      clearExisting: options.clearExisting,
      onCleared: (removed) => this.logger.debug?.(`Cleared ${removed} course(s)`),
      signal: options.signal,
      onDocumentStart: options.onDocument,
      onEmbedProgress: options.onEmbedProgress,
      onWarning: (message) => this.logger.warn(message),
    });
  }
}
