// src/sessions/cached-session.store.ts
import { LRUCache } from 'lru-cache';
import { ChatMessage } from '../ai/ai.types';
import { copyMessages, SessionStore, SessionSummary } from './session.store';

interface PendingRead {
  readers: number;
  /** Set when a write touched the session while the read was in flight. */
  stale: boolean;
}

/**
 * Read-through LRU in front of a remote store. Every write invalidates the
 * session's entry, and a read that overlapped a write returns its result
 * without filling the cache.
 */
export class CachedSessionStore implements SessionStore {
  private readonly cache: LRUCache<string, ChatMessage[]>;
  private readonly pending = new Map<string, PendingRead>();

  constructor(
    private readonly inner: SessionStore,
    ttlMs: number,
    max = 1000,
  ) {
    this.cache = new LRUCache<string, ChatMessage[]>({ max, ttl: ttlMs });
  }

  async get(sessionId: string): Promise<ChatMessage[]> {
    const cached = this.cache.get(sessionId);
    if (cached) return copyMessages(cached);

    const read = this.pending.get(sessionId) ?? { readers: 0, stale: false };
    read.readers += 1;
    this.pending.set(sessionId, read);

    try {
      const history = await this.inner.get(sessionId);
      if (!read.stale) this.cache.set(sessionId, copyMessages(history));
      return history;
    } finally {
      read.readers -= 1;
      if (read.readers === 0) this.pending.delete(sessionId);
    }
  }

  async update(sessionId: string, messages: ChatMessage[]): Promise<void> {
    this.invalidate(sessionId);
    try {
      await this.inner.update(sessionId, messages);
    } finally {
      this.invalidate(sessionId);
    }
  }

  async clear(sessionId: string): Promise<boolean> {
    this.invalidate(sessionId);
    try {
      return await this.inner.clear(sessionId);
    } finally {
      this.invalidate(sessionId);
    }
  }

  listActive(maxAgeMs: number): Promise<SessionSummary[]> {
    return this.inner.listActive(maxAgeMs);
  }

  async close(): Promise<void> {
    this.cache.clear();
    await this.inner.close?.();
  }

  private invalidate(sessionId: string): void {
    this.cache.delete(sessionId);
    const read = this.pending.get(sessionId);
    if (read) read.stale = true;
  }
}
