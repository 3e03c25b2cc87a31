/**
 * Configuration Schema
 *
 * Defines the shape of ~/.cqa/config.toml using Zod. The schema supplies both
 * the TypeScript types and the runtime validation of user files.
 */

import { z } from 'zod';

/**
 * Embedding providers that run locally
 */
export const EmbeddingProviderTypeSchema = z.enum(['huggingface', 'ollama']);

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider (huggingface runs in-process, ollama needs a server)'),
  model: z.string().min(1).describe('Embedding model name'),
  fallback_provider: EmbeddingProviderTypeSchema.optional().describe('Fallback provider if primary fails'),
  fallback_model: z.string().optional().describe('Fallback model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(32)
    .describe('Number of texts to embed per batch (1-100, default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(120000)
    .describe('Timeout in milliseconds for one embedding batch'),
});

/**
 * How course lessons are cut into chunks
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(50).max(10000).describe('Target chunk length in characters, context prefix included'),
  chunk_overlap: z.number().int().min(0).max(5000).describe('Characters of trailing sentences repeated in the next chunk'),
});

/**
 * Semantic search configuration
 */
export const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(50).describe('Results returned per search tool call'),
});

/**
 * Conversation history configuration
 */
export const SessionConfigSchema = z.object({
  max_history: z.number().int().min(0).max(50).describe('Exchanges (user + assistant pairs) kept per session'),
});

/**
 * Generation settings for the answering model
 */
export const AgentConfigSchema = z.object({
  max_tokens: z.number().int().min(1).max(32000).describe('Maximum tokens per model response'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
});

export const DocumentsConfigSchema = z.object({
  path: z.string().min(1).describe('Directory of course documents loaded by `cqa ingest` and when `cqa ask` or `cqa chat` starts'),
});

export const StorageConfigSchema = z.object({
  db_path: z.string().min(1).optional().describe('SQLite database file (default ~/.cqa/courses.db)'),
});

/**
 * LLM provider type (used in multiple schemas)
 */
export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai', 'ollama']);

/**
 * LLM fallback configuration
 */
export const LLMConfigSchema = z.object({
  fallback_providers: z
    .array(LLMProviderTypeSchema)
    .optional()
    .describe('Fallback providers if primary fails (e.g., ["openai", "ollama"])'),
  fallback_models: z
    .record(LLMProviderTypeSchema, z.string())
    .optional()
    .describe('Model to use per fallback provider (e.g., { openai: "gpt-4o" })'),
});

/**
 * Root configuration schema: the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_model: z.string().min(1).describe('Language model used to answer questions'),
  default_provider: LLMProviderTypeSchema.describe('LLM provider to use'),
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  session: SessionConfigSchema,
  agent: AgentConfigSchema,
  documents: DocumentsConfigSchema,
  storage: StorageConfigSchema.optional(),
  llm: LLMConfigSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;

/**
 * Every field optional, for sparse user files merged over the defaults
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
