// src/sessions/redis-session.store.ts
import { Logger } from '@nestjs/common';
import { ChatMessage } from '../ai/ai.types';
import { TaskPool } from '../shared/lib/task-pool';
import { SessionError, errorMessage } from '../shared/errors';
import { copyMessages, parseMessages, SessionStore, SessionSummary } from './session.store';

/** The slice of the ioredis client the store relies on. */
export interface SessionKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  pexpire(key: string, milliseconds: number): Promise<number>;
  del(key: string): Promise<number>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrem(key: string, member: string): Promise<number>;
  zremrangebyscore(key: string, min: number | string, max: number | string): Promise<number>;
  zrevrangebyscore(key: string, max: number | string, min: number | string): Promise<string[]>;
  quit(): Promise<unknown>;
}

export interface RedisSessionStoreOptions {
  keyPrefix: string;
  /** Key expiry after the last append; `0` disables expiry. */
  idleTtlMs: number;
}

interface StoredSession {
  history: ChatMessage[];
  lastActivity: number;
}

/**
 * Sessions as JSON documents (`<prefix>session:<id>`) plus a sorted set of
 * last-activity timestamps (`<prefix>sessions:activity`) for listing.
 * Appends are serialised in-process with a store-wide mutex.
 */
export class RedisSessionStore implements SessionStore {
  private readonly logger = new Logger(RedisSessionStore.name);
  private readonly lock = new TaskPool(1);

  constructor(
    private readonly redis: SessionKeyValueClient,
    private readonly options: RedisSessionStoreOptions,
    private readonly now: () => number = Date.now,
  ) {}

  private sessionKey(sessionId: string): string {
    return `${this.options.keyPrefix}session:${sessionId}`;
  }

  private get activityKey(): string {
    return `${this.options.keyPrefix}sessions:activity`;
  }

  async get(sessionId: string): Promise<ChatMessage[]> {
    const stored = await this.guard('get', () => this.read(sessionId));
    return stored ? copyMessages(stored.history) : [];
  }

  async update(sessionId: string, messages: ChatMessage[]): Promise<void> {
    await this.guard('update', () => this.lock.run(async () => {
      const current = await this.read(sessionId);
      const next: StoredSession = {
        history: [...(current?.history ?? []), ...copyMessages(messages)],
        lastActivity: this.now(),
      };

      const key = this.sessionKey(sessionId);
      await this.redis.set(key, JSON.stringify(next));
      if (this.options.idleTtlMs > 0) {
        await this.redis.pexpire(key, this.options.idleTtlMs);
      }
      await this.redis.zadd(this.activityKey, next.lastActivity, sessionId);
      await this.pruneExpired();
    }));
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.guard('clear', () => this.lock.run(async () => {
      const removed = await this.redis.del(this.sessionKey(sessionId));
      await this.redis.zrem(this.activityKey, sessionId);
      return removed > 0;
    }));
  }

  async listActive(maxAgeMs: number): Promise<SessionSummary[]> {
    return this.guard('listActive', () => this.scanActive(maxAgeMs));
  }

  private async scanActive(maxAgeMs: number): Promise<SessionSummary[]> {
    await this.pruneExpired();
    const ids = await this.redis.zrevrangebyscore(
      this.activityKey,
      '+inf',
      this.now() - maxAgeMs,
    );

    const summaries: SessionSummary[] = [];
    for (const id of ids) {
      const stored = await this.read(id);
      if (!stored) {
        // key expired through idle TTL; drop it from the index too
        await this.redis.zrem(this.activityKey, id);
        continue;
      }
      summaries.push({
        id,
        messageCount: stored.history.length,
        lastActivity: stored.lastActivity,
      });
    }
    return summaries;
  }

  /** Drops index entries whose session key has outlived the idle TTL. */
  private async pruneExpired(): Promise<void> {
    if (this.options.idleTtlMs <= 0) return;
    await this.redis.zremrangebyscore(this.activityKey, '-inf', this.now() - this.options.idleTtlMs);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  /** Redis transport failures surface as SessionError. */
  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new SessionError(`Session store ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async read(sessionId: string): Promise<StoredSession | null> {
    const raw = await this.redis.get(this.sessionKey(sessionId));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`corrupt session ${sessionId}, treating as empty: ${errorMessage(err)}`);
      return null;
    }

    if (!parsed || typeof parsed !== 'object') return null;
    const lastActivity: unknown = Reflect.get(parsed, 'lastActivity');
    return {
      history: parseMessages(Reflect.get(parsed, 'history')),
      lastActivity: typeof lastActivity === 'number' ? lastActivity : 0,
    };
  }
}
