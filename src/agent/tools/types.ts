/**
 * Agent Tool Types
 */

import type { z } from 'zod';
import type { AnswerSource } from '../../search/types.js';
import type { JsonSchemaObject } from '../model.js';

/**
 * What a tool hands back: text for the model, sources for the answer.
 */
export interface ToolOutcome {
  observation: string;
  sources: AnswerSource[];
}

export interface CourseTool<Args> {
  readonly name: string;
  readonly description: string;
  /** Declared to the model */
  readonly parameters: JsonSchemaObject;
  /** Validates the model's arguments */
  readonly schema: z.ZodType<Args, z.ZodTypeDef, unknown>;
  execute(args: Args): Promise<ToolOutcome>;
}

/**
 * A model tool call after it has been checked against the registry.
 */
export type ToolRequest =
  | { type: 'invoke'; id: string; name: string; args: unknown; run: () => Promise<ToolOutcome> }
  | { type: 'unknown_tool'; id: string; name: string }
  | { type: 'invalid_arguments'; id: string; name: string; reason: string };
