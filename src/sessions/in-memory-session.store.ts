// src/sessions/in-memory-session.store.ts
import { ChatMessage } from '../ai/ai.types';
import { TaskPool } from '../shared/lib/task-pool';
import { copyMessages, SessionStore, SessionSummary } from './session.store';

interface SessionEntry {
  history: ChatMessage[];
  lastActivity: number;
}

/**
 * Process-local store. Sessions idle for longer than `idleTtlMs` are evicted
 * lazily on the next access; `0` keeps them forever.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly lock = new TaskPool(1);

  constructor(
    private readonly idleTtlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(sessionId: string): Promise<ChatMessage[]> {
    return this.lock.run(() => {
      this.evictIdle();
      const entry = this.sessions.get(sessionId);
      return entry ? copyMessages(entry.history) : [];
    });
  }

  async update(sessionId: string, messages: ChatMessage[]): Promise<void> {
    await this.lock.run(() => {
      this.evictIdle();
      const entry = this.sessions.get(sessionId) ?? { history: [], lastActivity: 0 };
      entry.history.push(...copyMessages(messages));
      entry.lastActivity = this.now();
      this.sessions.set(sessionId, entry);
    });
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.lock.run(() => this.sessions.delete(sessionId));
  }

  async listActive(maxAgeMs: number): Promise<SessionSummary[]> {
    return this.lock.run(() => {
      this.evictIdle();
      const cutoff = this.now() - maxAgeMs;
      return [...this.sessions.entries()]
        .filter(([, entry]) => entry.lastActivity >= cutoff)
        .map(([id, entry]) => ({
          id,
          messageCount: entry.history.length,
          lastActivity: entry.lastActivity,
        }))
        .sort((a, b) => b.lastActivity - a.lastActivity);
    });
  }

  private evictIdle(): void {
    if (this.idleTtlMs <= 0) return;
    const cutoff = this.now() - this.idleTtlMs;
    for (const [id, entry] of this.sessions) {
      if (entry.lastActivity < cutoff) this.sessions.delete(id);
    }
  }
}
