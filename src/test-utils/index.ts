/**
 * Test Utilities
 *
 * In-process stand-ins for the embedding backend and the language model.
 */

export { createHashingEmbeddingProvider, hashEmbedding, tokenize, type HashingProviderOptions } from './embedding.js';
export {
  createScriptedChatModel,
  textResponse,
  toolCallResponse,
  type ScriptedChatModel,
  type ScriptedStep,
} from './chat-model.js';
