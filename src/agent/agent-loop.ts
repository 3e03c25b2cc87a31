/**
 * Course Agent
 *
 * Drives the chat model through at most one round of tool calls:
 *
 * ```
 * idle → awaiting_model ─┬─ text only ─────────────────────────────────────────→ done
 *                        └─ tool calls → executing_tools → awaiting_model ──────→ done
 * ```
 *
 * The second model response is final. Tool calls it requests are not run.
 */

import { ModelUnavailableError, toError } from '../errors/index.js';
import type { Turn } from '../session/store.js';
import type { AnswerSource } from '../search/types.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import type { ChatModel, ModelMessage, ModelResponse } from './model.js';
import { SYSTEM_PROMPT } from './prompts.js';
import type { ToolRegistry } from './tools/registry.js';
import type { AgentResult, AgentState } from './types.js';

export const FALLBACK_ANSWER = 'Unable to generate a response.';
export const MAX_TOOL_ROUNDS = 1;

export interface CourseAgentOptions {
  model: ChatModel;
  tools: ToolRegistry;
  systemPrompt?: string;
  /** @default 800 */
  maxTokens?: number;
  /** @default 0 */
  temperature?: number;
  logger?: Logger;
}

export class CourseAgent {
  private readonly model: ChatModel;
  private readonly tools: ToolRegistry;
  private readonly systemPrompt: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly logger: Logger;

  constructor(options: CourseAgentOptions) {
    this.model = options.model;
    this.tools = options.tools;
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    this.maxTokens = options.maxTokens ?? 800;
    this.temperature = options.temperature ?? 0;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Answer `question` given the session's earlier turns.
   *
   * @throws ModelUnavailableError when the model call fails
   */
  async run(question: string, history: Turn[] = []): Promise<AgentResult> {
    const states: AgentState[] = ['idle'];
    const messages: ModelMessage[] = [
      ...history.map((turn): ModelMessage => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: question },
    ];
    let sources: AnswerSource[] = [];
    let toolRounds = 0;

    states.push('awaiting_model');
    let response = await this.complete(messages);

    while (response.toolCalls.length > 0 && toolRounds < MAX_TOOL_ROUNDS) {
      states.push('tool_calls_requested');
      messages.push({ role: 'assistant', content: response.text, toolCalls: response.toolCalls });

      states.push('executing_tools');
      for (const call of response.toolCalls) {
        const request = this.tools.parse(call);
        this.logger.debug?.(`Tool call ${call.name} (${request.type})`);
        const outcome = await this.tools.execute(request);
        if (outcome.sources.length > 0) {
          sources = outcome.sources;
        }
        messages.push({ role: 'tool', toolCallId: call.id, name: call.name, content: outcome.observation });
      }
      toolRounds++;

      states.push('awaiting_model');
      response = await this.complete(messages);
    }

    if (response.toolCalls.length > 0) {
      this.logger.debug?.(`Ignoring ${response.toolCalls.length} tool call(s) after the last tool round`);
    }

    states.push('done');
    const answer = response.text.trim();
    return { answer: answer.length > 0 ? answer : FALLBACK_ANSWER, sources, toolRounds, states };
  }

  private async complete(messages: ModelMessage[]): Promise<ModelResponse> {
    try {
      return await this.model.complete({
        system: this.systemPrompt,
        messages: [...messages],
        tools: this.tools.definitions(),
        maxTokens: this.maxTokens,
        temperature: this.temperature,
      });
    } catch (error) {
      if (error instanceof ModelUnavailableError) {
        throw error;
      }
      const cause = toError(error);
      throw new ModelUnavailableError(cause.message, cause);
    }
  }
}
