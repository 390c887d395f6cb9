export type MessageRole = 'user' | 'assistant' | 'system';

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system'];

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  /** Ask the model for a JSON object (`response_format: json_object`). */
  json?: boolean;
  signal?: AbortSignal;
  /** Label used in usage and error logs. */
  kind?: string;
}

export function isMessageRole(value: unknown): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}
