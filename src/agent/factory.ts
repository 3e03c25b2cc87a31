/**
 * Builds a ready CourseAssistant from configuration: course index, LLM
 * provider (with fallback) and conversation store.
 */

import { existsSync } from 'node:fs';

import { expandHome } from '../config/paths.js';
import type { Config } from '../config/schema.js';
import { createLLMProvider, type FallbackOptions, type ProviderType } from '../providers/index.js';
import { openCourseIndex, type OpenCourseIndexOptions } from '../search/open.js';
import { ConversationStore } from '../session/store.js';
import { CourseAssistant } from './assistant.js';
import { ProviderChatModel } from './provider-model.js';
import type { LoadDocumentsResult } from './types.js';

export interface CreateAssistantOptions extends OpenCourseIndexOptions {
  /** Overrides config.default_model */
  model?: string;
  fallback?: FallbackOptions;
  /**
   * Load config.documents.path before returning. Known titles are skipped,
   * so repeated starts add nothing. A missing folder is ignored.
   */
  loadDocuments?: boolean;
}

export interface AssistantHandle {
  assistant: CourseAssistant;
  provider: ProviderType;
  model: string;
  usedFallback: boolean;
  /** Result of the startup load, when one ran */
  loaded?: LoadDocumentsResult;
  /** Closes the database */
  close(): void;
}

/**
 * @throws DatabaseError, IndexUnavailableError, or AllProvidersFailedError
 */
export async function createCourseAssistant(
  config: Config,
  options: CreateAssistantOptions = {}
): Promise<AssistantHandle> {
  const opened = await openCourseIndex(config, options);

  try {
    const llm = await createLLMProvider(config, { model: options.model, fallback: options.fallback });

    const assistant = new CourseAssistant({
      index: opened.index,
      model: new ProviderChatModel(llm.provider),
      sessions: new ConversationStore(config.session.max_history),
      maxResults: config.search.max_results,
      maxTokens: config.agent.max_tokens,
      temperature: config.agent.temperature,
      chunking: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
      logger: options.logger,
    });

    let loaded: LoadDocumentsResult | undefined;
    if (options.loadDocuments) {
      const directory = expandHome(config.documents.path);
      if (existsSync(directory)) {
        loaded = await assistant.loadDocuments(directory);
        options.logger?.debug?.(
          `Loaded ${loaded.coursesAdded} course(s) from ${directory}, ${loaded.skipped.length} already indexed`
        );
      } else {
        options.logger?.debug?.(`Documents folder not found, skipping startup load: ${directory}`);
      }
    }

    return {
      assistant,
      provider: llm.name,
      model: llm.model,
      usedFallback: llm.usedFallback,
      loaded,
      close: opened.close,
    };
  } catch (error) {
    opened.close();
    throw error;
  }
}
