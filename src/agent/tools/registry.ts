/**
 * Tool Registry
 *
 * Maps tool names to course tools, turns raw model tool calls into
 * ToolRequests and executes them. Every call ends in exactly one text
 * observation.
 */

import type { ZodIssue } from 'zod';

import { toError } from '../../errors/index.js';
import type { ToolCallRequest, ToolSchema } from '../model.js';
import type { CourseTool, ToolOutcome, ToolRequest } from './types.js';

interface RegisteredTool {
  definition: ToolSchema;
  resolve: (id: string, args: unknown) => ToolRequest;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register<Args>(tool: CourseTool<Args>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }

    this.tools.set(tool.name, {
      definition: { name: tool.name, description: tool.description, parameters: tool.parameters },
      resolve: (id, raw) => {
        const parsed = tool.schema.safeParse(raw);
        if (!parsed.success) {
          return { type: 'invalid_arguments', id, name: tool.name, reason: formatIssues(parsed.error.issues) };
        }
        const args = parsed.data;
        return { type: 'invoke', id, name: tool.name, args, run: () => tool.execute(args) };
      },
    });
    return this;
  }

  definitions(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  parse(call: ToolCallRequest): ToolRequest {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return { type: 'unknown_tool', id: call.id, name: call.name };
    }

    let raw: unknown;
    try {
      raw = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
    } catch (error) {
      return {
        type: 'invalid_arguments',
        id: call.id,
        name: call.name,
        reason: `arguments are not valid JSON (${toError(error).message})`,
      };
    }

    return tool.resolve(call.id, raw);
  }

  /**
   * Run a request. Any failure, an unreachable index included, becomes the
   * call's observation.
   */
  async execute(request: ToolRequest): Promise<ToolOutcome> {
    switch (request.type) {
      case 'unknown_tool':
        return { observation: `Tool '${request.name}' not found`, sources: [] };
      case 'invalid_arguments':
        return { observation: `Invalid arguments for tool '${request.name}': ${request.reason}`, sources: [] };
      case 'invoke':
        try {
          return await request.run();
        } catch (error) {
          return { observation: `Tool execution failed: ${toError(error).message}`, sources: [] };
        }
    }
  }
}
