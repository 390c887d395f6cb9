import { ContentType } from '../extraction/extraction.types';

export type SearchResult =
  | { ok: true; url: string; title?: string; content: string; contentType: ContentType }
  | { ok: false; url: string | null; error: string };

export interface SearchHit {
  url: string;
  title?: string;
}

export const NO_RESULTS_MESSAGE =
  'No relevant legal documents found. Would you like to provide more details about your situation?';

export const SEARCH_FAILED_MESSAGE =
  'I encountered an issue while searching. Could you please rephrase your question or provide more details?';
