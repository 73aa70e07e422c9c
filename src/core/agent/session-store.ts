/**
 * Session Store
 *
 * Bounded in-memory history per sessionId. Least recently used sessions
 * are evicted first; each session keeps its most recent turns.
 */

import type { HistoryEntry } from './types';

export interface SessionStore {
  load(sessionId: string): HistoryEntry[];
  save(sessionId: string, history: readonly HistoryEntry[]): void;
  readonly size: number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, HistoryEntry[]>();

  constructor(
    private readonly maxSessions: number,
    private readonly maxTurns: number
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  load(sessionId: string): HistoryEntry[] {
    const history = this.sessions.get(sessionId);
    if (!history) return [];
    // Re-insert to mark as most recently used
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, history);
    return [...history];
  }

  save(sessionId: string, history: readonly HistoryEntry[]): void {
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, trimTurns(history, this.maxTurns));

    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }
}

/**
 * Keep the last `maxTurns` turns. A turn starts at a user entry, so tool
 * entries never lose the message that caused them.
 */
export function trimTurns(history: readonly HistoryEntry[], maxTurns: number): HistoryEntry[] {
  let turns = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i]?.kind === 'user') {
      turns++;
      if (turns === maxTurns) return history.slice(i);
    }
  }
  return [...history];
}
