// src/retrieval/retrieval.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { RetrievalError, ValidationError, errorMessage } from '../shared/errors';
import { EmbeddingsService } from './embeddings.service';
import { formatRetrievedDocuments } from './context-formatter';
import { parseMetadataFilters } from './metadata';
import {
  RetrievedDocument,
  SearchOptions,
  VECTOR_BACKEND,
  VectorBackend,
} from './retrieval.types';

const MAX_RESULTS_LIMIT = 10;

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    private readonly embeddings: EmbeddingsService,
    @Inject(VECTOR_BACKEND) private readonly backend: VectorBackend,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  /**
   * Semantic search with optional `field:value` filters embedded in the
   * query. Returns documents by descending score; an empty array means no
   * hits. Backend and embedding failures raise RetrievalError.
   */
  async search(query: string, options: SearchOptions = {}): Promise<RetrievedDocument[]> {
    const maxResults = options.maxResults ?? this.config.retrieval.maxResults;
    const threshold = options.confidenceThreshold ?? this.config.retrieval.confidenceThreshold;

    if (!query || !query.trim()) {
      throw new ValidationError('Query must be a non-empty string');
    }
    if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > MAX_RESULTS_LIMIT) {
      throw new ValidationError(`maxResults must be an integer between 1 and ${MAX_RESULTS_LIMIT}`);
    }
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new ValidationError('confidenceThreshold must be between 0 and 1');
    }

    const { text, filters } = parseMetadataFilters(query);
    // a query made only of filters still needs something to embed
    const searchText = text || query.trim();

    let documents: RetrievedDocument[];
    try {
      const vector = await this.embeddings.embed(searchText);
      documents = await this.backend.similaritySearch(vector, maxResults, filters);
    } catch (err) {
      if (err instanceof RetrievalError) throw err;
      throw new RetrievalError(
        `Vector search failed on ${this.backend.name}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const sorted = [...documents].sort((a, b) => b.score - a.score);
    const kept = threshold > 0 ? sorted.filter((doc) => doc.score >= threshold) : sorted;

    this.logger.log(
      `search backend=${this.backend.name} hits=${documents.length} kept=${kept.length} filters=${JSON.stringify(filters)}`,
    );

    return kept;
  }

  formatForContext(query: string, documents: RetrievedDocument[]): string {
    return formatRetrievedDocuments(query, documents);
  }

  async ping(): Promise<void> {
    await this.backend.ping();
  }
}
