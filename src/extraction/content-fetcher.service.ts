// src/extraction/content-fetcher.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance, isAxiosError } from 'axios';
import { LRUCache } from 'lru-cache';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { ExtractionError, errorMessage } from '../shared/errors';
import { HTTP_CLIENT } from '../shared/lib/http/http.module';
import { retryWithBackoff } from '../shared/lib/retry';
import { ContentType, FetchedContent } from './extraction.types';
import { extractHtmlText } from './html-extractor';
import { extractPdfText } from './pdf-extractor';
import { truncate } from './text';

type Extracted = { text: string; contentType: ContentType };

function isRetryable(error: unknown): boolean {
  if (!isAxiosError(error) || !error.response) return true;
  const status = error.response.status;
  return status >= 500 || status === 408 || status === 429;
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function detectContentType(url: string, header: string): ContentType | null {
  const type = header.toLowerCase();
  if (type.includes('application/pdf')) return 'PDF';
  if (type.includes('text/html') || type.includes('application/xhtml+xml')) return 'HTML';
  if (new URL(url).pathname.toLowerCase().endsWith('.pdf')) return 'PDF';
  return null;
}

/**
 * Downloads a page or PDF and returns its readable text. Successful
 * extractions are cached by URL; failures are not, so a later call retries.
 */
@Injectable()
export class ContentFetcherService {
  private readonly logger = new Logger(ContentFetcherService.name);
  private readonly cache: LRUCache<string, Extracted>;

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {
    this.cache = new LRUCache<string, Extracted>({
      max: 500,
      ttl: config.fetch.cacheTtlMs,
    });
  }

  async fetchContent(url: string): Promise<FetchedContent> {
    if (!isHttpUrl(url)) {
      return { ok: false, url, error: 'Invalid URL format' };
    }

    const cached = this.cache.get(url);
    if (cached) {
      this.logger.debug(`cache hit ${url}`);
      return { ok: true, url, ...cached };
    }

    try {
      const extracted = await this.download(url);
      this.cache.set(url, extracted);
      return { ok: true, url, ...extracted };
    } catch (err) {
      this.logger.warn(`fetch failed url=${url}: ${errorMessage(err)}`);
      return { ok: false, url, error: errorMessage(err) };
    }
  }

  private async download(url: string): Promise<Extracted> {
    const { fetch } = this.config;

    const response = await retryWithBackoff(
      () =>
        this.http.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          timeout: fetch.timeoutMs,
          headers: { Accept: 'text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8' },
        }),
      {
        maxRetries: fetch.maxAttempts - 1,
        initialDelay: fetch.retryDelayMs,
        shouldRetry: isRetryable,
        label: `fetch ${url}`,
      },
    );

    const header = String(response.headers['content-type'] ?? '');
    const contentType = detectContentType(url, header);
    if (!contentType) {
      throw new ExtractionError('Unsupported content type');
    }

    const body = Buffer.from(response.data);
    const raw =
      contentType === 'PDF'
        ? await extractPdfText(body)
        : extractHtmlText(body.toString('utf-8'));

    const text = truncate(raw, fetch.maxSourceChars);
    if (!text) {
      throw new ExtractionError('No readable text extracted');
    }

    this.logger.log(`extracted ${contentType} chars=${text.length} url=${url}`);
    return { text, contentType };
  }
}
