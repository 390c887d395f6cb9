// src/shared/errors.ts

/**
 * Base class for every failure the assistant raises on purpose.
 * The optional `cause` keeps the underlying provider error for logging;
 * it is never sent to the client.
 */
export abstract class AssistantError extends Error {
  abstract readonly kind:
    | 'validation'
    | 'retrieval'
    | 'search'
    | 'extraction'
    | 'synthesis'
    | 'session';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AssistantError {
  readonly kind = 'validation' as const;
}

/** Vector backend or embedding transport failure. */
export class RetrievalError extends AssistantError {
  readonly kind = 'retrieval' as const;
}

/** One failed online-search attempt. Never escapes the search adapter. */
export class SearchError extends AssistantError {
  readonly kind = 'search' as const;
}

export class ExtractionError extends AssistantError {
  readonly kind = 'extraction' as const;
}

/** LLM call failed or returned nothing usable. */
export class SynthesisError extends AssistantError {
  readonly kind = 'synthesis' as const;
}

export class SessionError extends AssistantError {
  readonly kind = 'session' as const;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorStack(err: unknown): string | undefined {
  return err instanceof Error ? err.stack : undefined;
}
