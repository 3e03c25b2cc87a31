/**
 * Scripted chat model for tests.
 *
 * Returns the queued steps in order and records every request it receives.
 * A step may be a response, an error to throw, or a function of the request.
 */

import type { ChatModel, ModelRequest, ModelResponse, ToolCallRequest } from '../agent/model.js';

export type ScriptedStep = ModelResponse | Error | ((request: ModelRequest) => ModelResponse);

export interface ScriptedChatModel extends ChatModel {
  readonly requests: ModelRequest[];
  /** Steps not yet consumed */
  readonly remaining: number;
}

export function textResponse(text: string): ModelResponse {
  return { text, toolCalls: [] };
}

export function toolCallResponse(name: string, args: Record<string, unknown> | string, id = 'call_1'): ModelResponse {
  const call: ToolCallRequest = { id, name, arguments: typeof args === 'string' ? args : JSON.stringify(args) };
  return { text: '', toolCalls: [call] };
}

export function createScriptedChatModel(steps: ScriptedStep[]): ScriptedChatModel {
  const queue = [...steps];
  const requests: ModelRequest[] = [];

  return {
    name: 'scripted',
    model: 'scripted-test',
    requests,
    get remaining() {
      return queue.length;
    },
    complete(request: ModelRequest): Promise<ModelResponse> {
      // Snapshot: the agent keeps appending to its message list
      requests.push({ ...request, messages: [...request.messages] });
      const step = queue.shift();
      if (step === undefined) {
        return Promise.reject(new Error('Scripted chat model has no responses left'));
      }
      if (step instanceof Error) {
        return Promise.reject(step);
      }
      return Promise.resolve(typeof step === 'function' ? step(request) : step);
    },
  };
}
