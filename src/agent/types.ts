/**
 * Agent Types
 */

import type { AnswerSource } from '../search/types.js';

/**
 * States the agent loop passes through for one question:
 * idle → awaiting_model → (tool_calls_requested → executing_tools → awaiting_model)? → done
 */
export type AgentState = 'idle' | 'awaiting_model' | 'tool_calls_requested' | 'executing_tools' | 'done';

export interface AgentResult {
  answer: string;
  /** Sources of the last tool call that produced any */
  sources: AnswerSource[];
  /** Tool rounds executed (0 or 1) */
  toolRounds: number;
  /** Every state visited, in order */
  states: AgentState[];
}

/**
 * Result of CourseAssistant.query()
 */
export interface QueryResult {
  answer: string;
  sources: AnswerSource[];
  sessionId: string;
}

export interface CourseStats {
  totalCourses: number;
  /** Sorted */
  courseTitles: string[];
}

export interface LoadDocumentsOptions {
  /** Delete every indexed course before loading */
  clearExisting?: boolean;
  /** Fired for each document as it is read */
  onDocument?: (path: string, index: number, total: number) => void;
  onEmbedProgress?: (path: string, embedded: number, total: number) => void;
  /** Checked between documents */
  signal?: AbortSignal;
}

export interface LoadFailure {
  path: string;
  error: string;
}

export interface LoadDocumentsResult {
  coursesAdded: number;
  chunksAdded: number;
  /** Documents whose course title was already indexed */
  skipped: string[];
  /** Documents that could not be parsed or stored */
  failed: LoadFailure[];
}
