import { ChatMessage } from '../ai/ai.types';

export type Intent = 'casual' | 'search_case' | 'summarize_case' | 'summarize' | 'general';

export const PARTY_ROLES = ['prosecution', 'defense', 'victim', 'accused'] as const;
export type PartyRole = (typeof PARTY_ROLES)[number];

export type OrchestratorState =
  | 'received'
  | 'direct_respond'
  | 'summarizing'
  | 'retrieving'
  | 'retrieved'
  | 'online_searching'
  | 'found'
  | 'exhausted'
  | 'synthesizing'
  | 'completed'
  | 'failed';

export interface ChatRequest {
  message: string;
  sessionId: string;
  role?: PartyRole;
  /** Seeds the session only when it has no stored history yet. */
  history?: ChatMessage[];
}

export interface SourceReference {
  kind: 'vector' | 'online';
  /** Statute reference for vector hits, URL for online hits. */
  reference: string;
  score?: number;
}

export interface ChatOutcome {
  response: string;
  intent: Intent;
  /** Every state the request passed through, in order. */
  states: OrchestratorState[];
  sources: SourceReference[];
  failed: boolean;
}
