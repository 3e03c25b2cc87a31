/**
 * Agent Module
 *
 * The tool-calling question answerer: a chat model drives at most one round
 * of course tool calls, and CourseAssistant ties it to the index and the
 * per-session history.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { assistant, close } = await createCourseAssistant(config);
 * try {
 *   const { answer, sources, sessionId } = await assistant.query('Which lessons cover embeddings?');
 * } finally {
 *   close();
 * }
 * ```
 */

export { CourseAssistant, type CourseAssistantOptions } from './assistant.js';
export { createCourseAssistant, type CreateAssistantOptions, type AssistantHandle } from './factory.js';
export { CourseAgent, FALLBACK_ANSWER, MAX_TOOL_ROUNDS, type CourseAgentOptions } from './agent-loop.js';
export { ProviderChatModel, toChatMessages } from './provider-model.js';
export { SYSTEM_PROMPT } from './prompts.js';
export type {
  ChatModel,
  JsonSchemaObject,
  ModelMessage,
  ModelRequest,
  ModelResponse,
  ToolCallRequest,
  ToolSchema,
} from './model.js';
export type {
  AgentResult,
  AgentState,
  QueryResult,
  CourseStats,
  LoadDocumentsOptions,
  LoadDocumentsResult,
  LoadFailure,
} from './types.js';
export * from './tools/index.js';
