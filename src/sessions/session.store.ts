// src/sessions/session.store.ts
import { ChatMessage, isMessageRole } from '../ai/ai.types';

export const SESSION_STORE = 'SESSION_STORE';

export interface SessionSummary {
  id: string;
  messageCount: number;
  /** Epoch milliseconds. */
  lastActivity: number;
}

/**
 * Per-session conversation history. Implementations serialise writes so an
 * append is atomic with respect to concurrent appends on any session.
 */
export interface SessionStore {
  /** Copy of the history; empty for unknown sessions. */
  get(sessionId: string): Promise<ChatMessage[]>;
  /** Appends, creating the session on first use. */
  update(sessionId: string, messages: ChatMessage[]): Promise<void>;
  /** Resolves false when there was nothing to delete. */
  clear(sessionId: string): Promise<boolean>;
  /** Sessions active within `maxAgeMs`, newest first. */
  listActive(maxAgeMs: number): Promise<SessionSummary[]>;
  /** Releases connections held by the store. */
  close?(): Promise<void>;
}

export function copyMessages(messages: readonly ChatMessage[]): ChatMessage[] {
  return messages.map((message) => ({ role: message.role, content: message.content }));
}

/** Keeps the well-formed entries of an untrusted history array. */
export function parseMessages(raw: unknown): ChatMessage[] {
  if (!Array.isArray(raw)) return [];
  const out: ChatMessage[] = [];
  for (const item of raw) {
    if (!item || typeof item !== 'object') continue;
    const role: unknown = Reflect.get(item, 'role');
    const content: unknown = Reflect.get(item, 'content');
    if (isMessageRole(role) && typeof content === 'string') {
      out.push({ role, content });
    }
  }
  return out;
}
