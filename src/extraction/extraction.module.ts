import { Module } from '@nestjs/common';
import { HttpModule } from '../shared/lib/http/http.module';
import { ContentFetcherService } from './content-fetcher.service';

@Module({
  imports: [HttpModule],
  providers: [ContentFetcherService],
  exports: [ContentFetcherService],
})
export class ExtractionModule {}
