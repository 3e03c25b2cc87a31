/**
 * Conversation Store
 *
 * Per-session message history bounded to the most recent exchanges. Sessions
 * live for the lifetime of the process; an unknown id simply has no history.
 */

import { randomUUID } from 'node:crypto';

export type TurnRole = 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  content: string;
}

export const DEFAULT_MAX_HISTORY = 2;

export class ConversationStore {
  private sessions = new Map<string, Turn[]>();
  private readonly maxTurns: number;

  /**
   * @param maxHistory - Exchanges (user + assistant pairs) kept per session; 0 keeps nothing
   */
  constructor(maxHistory: number = DEFAULT_MAX_HISTORY) {
    if (!Number.isInteger(maxHistory) || maxHistory < 0) {
      throw new RangeError(`maxHistory must be a non-negative integer, got ${maxHistory}`);
    }
    this.maxTurns = maxHistory * 2;
  }

  newSessionId(): string {
    return `session_${randomUUID()}`;
  }

  /** A copy of the session's turns, oldest first */
  getHistory(sessionId: string): Turn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  append(sessionId: string, role: TurnRole, content: string): void {
    this.push(sessionId, [{ role, content }]);
  }

  /**
   * Append a question and its answer together, so interleaved queries on one
   * session never split a pair.
   */
  appendExchange(sessionId: string, question: string, answer: string): void {
    this.push(sessionId, [
      { role: 'user', content: question },
      { role: 'assistant', content: answer },
    ]);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  private push(sessionId: string, turns: Turn[]): void {
    if (this.maxTurns === 0) {
      return;
    }
    const history = this.sessions.get(sessionId) ?? [];
    history.push(...turns);
    // Oldest turns go first
    if (history.length > this.maxTurns) {
      history.splice(0, history.length - this.maxTurns);
    }
    this.sessions.set(sessionId, history);
  }
}
