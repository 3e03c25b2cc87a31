/**
 * Default Configuration Values
 *
 * Used when no config.toml exists and for every field a user file omits.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_model: 'claude-sonnet-4-20250514',
  default_provider: 'anthropic',

  // Primary and fallback must agree on dimensions (384)
  embedding: {
    provider: 'huggingface',
    model: 'Xenova/all-MiniLM-L6-v2',
    fallback_provider: 'ollama',
    fallback_model: 'all-minilm',
    batch_size: 32,
    timeout_ms: 120000,
  },

  chunking: {
    chunk_size: 800,
    chunk_overlap: 100,
  },

  search: {
    max_results: 5,
  },

  session: {
    max_history: 2,
  },

  agent: {
    max_tokens: 800,
    temperature: 0,
  },

  documents: {
    path: './docs',
  },
};

/**
 * Written to ~/.cqa/config.toml by `cqa config init`
 */
export const CONFIG_TEMPLATE = `# Course Q&A Assistant Configuration
# Location: ~/.cqa/config.toml

# Answering model
default_model = "${DEFAULT_CONFIG.default_model}"
default_provider = "${DEFAULT_CONFIG.default_provider}"

# Embeddings: primary and fallback must produce vectors of the same size
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
fallback_provider = "ollama"
fallback_model = "all-minilm"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Chunking (characters, context prefix included)
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[search]
max_results = ${DEFAULT_CONFIG.search.max_results}

# Exchanges remembered per chat session
[session]
max_history = ${DEFAULT_CONFIG.session.max_history}

[agent]
max_tokens = ${DEFAULT_CONFIG.agent.max_tokens}
temperature = ${DEFAULT_CONFIG.agent.temperature}

[documents]
path = "${DEFAULT_CONFIG.documents.path}"

# [storage]
# db_path = "~/.cqa/courses.db"

# [llm]
# fallback_providers = ["openai", "ollama"]
`;
