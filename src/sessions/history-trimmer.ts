// src/sessions/history-trimmer.ts
import { ChatMessage } from '../ai/ai.types';

/** Rough token count: one token per four characters. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Fits a history into `budget` estimated tokens. A leading system message is
 * always kept; the rest is filled newest-first and stops at the first
 * message that would overflow, so the kept tail is contiguous.
 */
export function trimHistory(messages: readonly ChatMessage[], budget: number): ChatMessage[] {
  if (messages.length === 0) return [];

  const [first, ...rest] = messages;
  const system = first.role === 'system' ? first : null;
  const candidates = system ? rest : [...messages];

  let remaining = budget - (system ? estimateTokens(system.content) : 0);
  const kept: ChatMessage[] = [];

  for (let i = candidates.length - 1; i >= 0; i--) {
    const cost = estimateTokens(candidates[i].content);
    if (cost > remaining) break;
    kept.unshift(candidates[i]);
    remaining -= cost;
  }

  return system ? [system, ...kept] : kept;
}
