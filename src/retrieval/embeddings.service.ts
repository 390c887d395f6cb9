// src/retrieval/embeddings.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { HTTP_CLIENT } from '../shared/lib/http/http.module';
import { RetrievalError, errorMessage } from '../shared/errors';

interface EmbeddingResponse {
  data?: { embedding?: number[]; index?: number }[];
}

@Injectable()
export class EmbeddingsService {
  private readonly logger = new Logger(EmbeddingsService.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  /** One request for the whole batch; output order follows `texts`. */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.http.post<EmbeddingResponse>(
        this.config.openai.embeddingsUrl,
        {
          input: texts,
          model: this.config.openai.embeddingModel,
        },
        {
          headers: {
            Authorization: `Bearer ${this.config.openai.apiKey}`,
          },
          timeout: this.config.openai.timeoutMs,
        },
      );

      const rows = [...(response.data.data ?? [])].sort(
        (a, b) => (a.index ?? 0) - (b.index ?? 0),
      );
      const embeddings = rows.map((row) => row.embedding ?? []);
      if (embeddings.length !== texts.length || embeddings.some((e) => e.length === 0)) {
        throw new Error('No embedding returned');
      }

      return embeddings;
    } catch (err) {
      this.logger.error(`Embedding error: ${errorMessage(err)}`);
      throw new RetrievalError('Failed to generate embedding', { cause: err });
    }
  }
}
