/**
 * Chat Model Port
 *
 * The agent loop talks to a language model through this interface only.
 * `ProviderChatModel` adapts an @contextaisdk/core LLMProvider to it; tests
 * use the scripted model from test-utils.
 */

/**
 * JSON Schema object describing a tool's arguments
 */
export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, { type: string; description: string }>;
  required: string[];
};

export interface ToolSchema {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

/**
 * A tool invocation requested by the model.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON text of the arguments, as the model produced it */
  arguments: string;
}

export type ModelMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

export interface ModelRequest {
  system: string;
  messages: ModelMessage[];
  tools: ToolSchema[];
  maxTokens: number;
  temperature: number;
}

export interface ModelResponse {
  text: string;
  toolCalls: ToolCallRequest[];
}

export interface ChatModel {
  /** Provider name, for display */
  readonly name: string;
  readonly model: string;
  complete(request: ModelRequest): Promise<ModelResponse>;
}
