// src/retrieval/retrieval.module.ts
import { Module } from '@nestjs/common';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { PgModule } from '../pg/pg.module';
import { HttpModule } from '../shared/lib/http/http.module';
import { LoggingModule } from '../shared/lib/logging/logging.module';
import { EmbeddingsService } from './embeddings.service';
import { PgVectorBackend } from './pgvector.backend';
import { QdrantVectorBackend } from './qdrant.backend';
import { RetrievalService } from './retrieval.service';
import { VECTOR_BACKEND, VectorBackend } from './retrieval.types';

@Module({
  imports: [PgModule, HttpModule, LoggingModule],
  providers: [
    EmbeddingsService,
    PgVectorBackend,
    QdrantVectorBackend,
    {
      provide: VECTOR_BACKEND,
      inject: [assistantConfig.KEY, PgVectorBackend, QdrantVectorBackend],
      useFactory: (
        config: AssistantConfig,
        pg: PgVectorBackend,
        qdrant: QdrantVectorBackend,
      ): VectorBackend => (config.vector.backend === 'qdrant' ? qdrant : pg),
    },
    RetrievalService,
  ],
  exports: [RetrievalService, EmbeddingsService, VECTOR_BACKEND],
})
export class RetrievalModule {}
