export type MetadataValue = string | number;

export interface RetrievedDocument {
  content: string;
  metadata: Record<string, MetadataValue>;
  /** Higher is more similar (cosine similarity for both backends). */
  score: number;
}

export type FilterField = 'section' | 'law_name' | 'title';

export type MetadataFilter = Partial<Record<FilterField, string>>;

export interface ParsedQuery {
  /** Query text with the filter tokens removed. */
  text: string;
  filters: MetadataFilter;
}

export interface VectorPoint {
  id: number;
  vector: number[];
  content: string;
  metadata: Record<string, string>;
}

export interface VectorBackend {
  readonly name: string;
  similaritySearch(
    vector: number[],
    limit: number,
    filter: MetadataFilter,
  ): Promise<RetrievedDocument[]>;
  upsert(points: VectorPoint[]): Promise<void>;
  ping(): Promise<void>;
}

export const VECTOR_BACKEND = 'VECTOR_BACKEND';

export interface SearchOptions {
  maxResults?: number;
  confidenceThreshold?: number;
}
