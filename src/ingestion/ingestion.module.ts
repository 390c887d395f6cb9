// src/ingestion/ingestion.module.ts
import { Module } from '@nestjs/common';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { IngestionService } from './ingestion.service';

@Module({
  imports: [RetrievalModule],
  providers: [IngestionService],
  exports: [IngestionService],
})
export class IngestionModule {}
