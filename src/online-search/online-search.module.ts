import { Module } from '@nestjs/common';
import { ExtractionModule } from '../extraction/extraction.module';
import { HttpModule } from '../shared/lib/http/http.module';
import { OnlineSearchService } from './online-search.service';
import { TavilySearchClient } from './tavily.client';

@Module({
  imports: [HttpModule, ExtractionModule],
  providers: [TavilySearchClient, OnlineSearchService],
  exports: [OnlineSearchService],
})
export class OnlineSearchModule {}
