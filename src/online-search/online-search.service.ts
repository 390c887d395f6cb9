// src/online-search/online-search.service.ts
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { createHash } from 'crypto';
import { LRUCache } from 'lru-cache';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { ContentFetcherService } from '../extraction/content-fetcher.service';
import { ValidationError, errorMessage } from '../shared/errors';
import { sleep } from '../shared/lib/retry';
import { selectAllowedUrls } from './domain-filter';
import { DEFAULT_RELAXATION_STRATEGIES, QueryRelaxationStrategy } from './query-relaxation';
import {
  NO_RESULTS_MESSAGE,
  SEARCH_FAILED_MESSAGE,
  SearchHit,
  SearchResult,
} from './online-search.types';
import { TavilySearchClient } from './tavily.client';

export const RELAXATION_STRATEGIES = 'RELAXATION_STRATEGIES';

export function searchCacheKey(query: string): string {
  return createHash('md5').update(query).digest('hex');
}

@Injectable()
export class OnlineSearchService {
  private readonly logger = new Logger(OnlineSearchService.name);
  private readonly cache: LRUCache<string, SearchResult[]>;
  private readonly strategies: readonly QueryRelaxationStrategy[];

  constructor(
    private readonly client: TavilySearchClient,
    private readonly fetcher: ContentFetcherService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
    @Optional() @Inject(RELAXATION_STRATEGIES) strategies?: readonly QueryRelaxationStrategy[],
  ) {
    this.strategies = strategies?.length ? strategies : DEFAULT_RELAXATION_STRATEGIES;
    this.cache = new LRUCache<string, SearchResult[]>({
      max: 1000,
      ttl: config.search.cacheTtlMs,
    });
  }

  /**
   * Domain-restricted web search with extracted page text per result.
   * Never throws for search failures: when every attempt comes back empty or
   * fails, the result is a single `{ ok: false }` entry carrying a message
   * that can be shown to the user.
   */
  async search(query: string): Promise<SearchResult[]> {
    const trimmed = query?.trim();
    if (!trimmed) {
      throw new ValidationError('Search query must be a non-empty string');
    }

    const key = searchCacheKey(trimmed);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.log(`cache hit query="${trimmed}"`);
      return cached.map((result) => ({ ...result }));
    }

    const { allowedDomains, maxResults, retryDelayMs } = this.config.search;
    const attempts = Math.min(this.config.search.maxAttempts, this.strategies.length);
    let failures = 0;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const strategy = this.strategies[attempt];
      const attemptQuery = strategy.apply(trimmed, allowedDomains);
      if (attempt > 0) await sleep(retryDelayMs);

      let hits: SearchHit[];
      try {
        hits = await this.client.search(attemptQuery, allowedDomains);
      } catch (err) {
        failures += 1;
        this.logger.warn(
          `attempt ${attempt + 1}/${attempts} strategy=${strategy.name} failed: ${errorMessage(err)}`,
        );
        continue;
      }

      const urls = selectAllowedUrls(
        hits.map((hit) => hit.url),
        allowedDomains,
        maxResults,
      );
      if (urls.length === 0) {
        this.logger.log(
          `attempt ${attempt + 1}/${attempts} strategy=${strategy.name} returned no allowed URLs (raw=${hits.length})`,
        );
        continue;
      }

      const results = await Promise.all(urls.map((url) => this.toResult(url, hits)));
      this.cache.set(key, results);
      this.logger.log(`found ${results.length} result(s) with strategy=${strategy.name}`);
      return results.map((result) => ({ ...result }));
    }

    return [
      {
        ok: false,
        url: null,
        error: failures === attempts ? SEARCH_FAILED_MESSAGE : NO_RESULTS_MESSAGE,
      },
    ];
  }

  private async toResult(url: string, hits: SearchHit[]): Promise<SearchResult> {
    const fetched = await this.fetcher.fetchContent(url);
    if (!fetched.ok) {
      return { ok: false, url, error: fetched.error };
    }

    const title = hits.find((hit) => hit.url === url)?.title;
    return {
      ok: true,
      url,
      ...(title ? { title } : {}),
      content: fetched.text,
      contentType: fetched.contentType,
    };
  }
}
