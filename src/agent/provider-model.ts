/**
 * LLMProvider adapter
 *
 * Runs a ModelRequest through `LLMProvider.streamChat` and collects the
 * streamed text and tool calls. Tool results are sent back as a user message
 * that names each call, so every provider sees plain alternating turns.
 */

import type { ChatMessage, GenerateOptions, LLMProvider } from '@contextaisdk/core';
import type { ChatModel, ModelMessage, ModelRequest, ModelResponse, ToolCallRequest } from './model.js';

/**
 * Flatten the port's messages into provider chat messages.
 *
 * Consecutive tool results become one user message.
 */
export function toChatMessages(system: string, messages: ModelMessage[]): ChatMessage[] {
  const chat: ChatMessage[] = [{ role: 'system', content: system }];
  let pendingResults: string[] = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      chat.push({ role: 'user', content: pendingResults.join('\n\n') });
      pendingResults = [];
    }
  };

  for (const message of messages) {
    switch (message.role) {
      case 'tool':
        pendingResults.push(`<tool_result name="${message.name}" id="${message.toolCallId}">\n${message.content}\n</tool_result>`);
        break;
      case 'assistant': {
        flushResults();
        const calls = (message.toolCalls ?? []).map(
          (call) => `<tool_call name="${call.name}" id="${call.id}">${call.arguments}</tool_call>`
        );
        const content = [message.content, ...calls].filter((part) => part.length > 0).join('\n');
        chat.push({ role: 'assistant', content });
        break;
      }
      case 'user':
        flushResults();
        chat.push({ role: 'user', content: message.content });
        break;
    }
  }
  flushResults();

  return chat;
}

export class ProviderChatModel implements ChatModel {
  readonly name: string;
  readonly model: string;

  constructor(private readonly provider: LLMProvider) {
    this.name = provider.name;
    this.model = provider.model;
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const options: GenerateOptions = {
      maxTokens: request.maxTokens,
      temperature: request.temperature,
      tools: request.tools,
    };

    const text: string[] = [];
    const toolCalls: ToolCallRequest[] = [];

    for await (const chunk of this.provider.streamChat(toChatMessages(request.system, request.messages), options)) {
      if (chunk.type === 'text' && chunk.content) {
        text.push(chunk.content);
      } else if (chunk.type === 'tool_call' && chunk.toolCall) {
        toolCalls.push({
          id: chunk.toolCall.id,
          name: chunk.toolCall.name,
          arguments: chunk.toolCall.arguments,
        });
      }
    }

    return { text: text.join(''), toolCalls };
  }
}
