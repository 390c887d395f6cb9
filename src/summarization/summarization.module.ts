import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { ExtractionModule } from '../extraction/extraction.module';
import { SummarizationService } from './summarization.service';

@Module({
  imports: [AiModule, ExtractionModule],
  providers: [SummarizationService],
  exports: [SummarizationService],
})
export class SummarizationModule {}
