// src/online-search/tavily.client.ts
import { Inject, Injectable } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { HTTP_CLIENT } from '../shared/lib/http/http.module';
import { SearchError, errorMessage } from '../shared/errors';
import { SearchHit } from './online-search.types';

interface TavilyResponse {
  results?: unknown;
}

function toHit(raw: unknown): SearchHit | null {
  if (!raw || typeof raw !== 'object') return null;
  const url: unknown = Reflect.get(raw, 'url');
  const title: unknown = Reflect.get(raw, 'title');
  if (typeof url !== 'string' || !url.trim()) return null;
  return typeof title === 'string' ? { url: url.trim(), title } : { url: url.trim() };
}

/** Thin REST client for the Tavily search API. */
@Injectable()
export class TavilySearchClient {
  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  async search(query: string, includeDomains: string[]): Promise<SearchHit[]> {
    const { search } = this.config;
    if (!search.tavilyApiKey) {
      throw new SearchError('TAVILY_API_KEY is not set');
    }

    try {
      const res = await this.http.post<TavilyResponse>(
        search.endpoint,
        {
          query,
          include_domains: includeDomains,
          max_results: search.maxResults,
          search_depth: 'basic',
        },
        {
          headers: { Authorization: `Bearer ${search.tavilyApiKey}` },
          timeout: search.timeoutMs,
        },
      );

      const results = res.data.results;
      if (!Array.isArray(results)) return [];

      return results.map(toHit).filter((hit): hit is SearchHit => hit !== null);
    } catch (err) {
      throw new SearchError(`Tavily search failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
