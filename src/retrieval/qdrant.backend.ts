// src/retrieval/qdrant.backend.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance, AxiosRequestConfig } from 'axios';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import { HTTP_CLIENT } from '../shared/lib/http/http.module';
import { normalizeMetadata } from './metadata';
import {
  MetadataFilter,
  MetadataValue,
  RetrievedDocument,
  VectorBackend,
  VectorPoint,
} from './retrieval.types';

interface QdrantScoredPoint {
  id: number | string;
  score: number;
  payload?: Record<string, unknown> | null;
}

interface QdrantSearchResponse {
  result?: QdrantScoredPoint[];
}

const CONTENT_KEYS = ['content', 'text', 'page_content'];

type QdrantCondition =
  | { key: string; match: { value: string | number } }
  | { should: QdrantCondition[] };

/** All-digit sections match whether the payload stores them as text or integer. */
export function matchCondition(key: string, value: string): QdrantCondition {
  if (key === 'section' && /^\d+$/.test(value)) {
    const section = parseInt(value, 10);
    return {
      should: [
        { key, match: { value: String(section) } },
        { key, match: { value: section } },
      ],
    };
  }
  return { key, match: { value } };
}

/**
 * Turns a raw point payload into a document. Ingested points carry their
 * text under `content`; older collections only hold the section fields, in
 * which case the text is rebuilt as `key: value | key: value`.
 */
export function payloadToDocument(
  payload: Record<string, unknown> | null | undefined,
  score: number,
): RetrievedDocument {
  const metadata: Record<string, MetadataValue> = normalizeMetadata(payload);
  let content = '';

  for (const key of CONTENT_KEYS) {
    const value = metadata[key];
    if (typeof value === 'string' && value.trim()) {
      content = value;
      break;
    }
  }
  for (const key of CONTENT_KEYS) delete metadata[key];

  if (!content) {
    content = Object.entries(metadata)
      .map(([key, value]) => `${key}: ${value}`)
      .join(' | ');
  }

  return { content, metadata, score };
}

@Injectable()
export class QdrantVectorBackend implements VectorBackend {
  readonly name = 'qdrant';
  private readonly logger = new Logger(QdrantVectorBackend.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
  ) {}

  private url(path: string): string {
    const base = this.config.vector.qdrantUrl.replace(/\/+$/, '');
    return `${base}/collections/${encodeURIComponent(this.config.vector.qdrantCollection)}${path}`;
  }

  private requestOptions(): AxiosRequestConfig {
    const apiKey = this.config.vector.qdrantApiKey;
    return {
      timeout: this.config.vector.timeoutMs,
      headers: apiKey ? { 'api-key': apiKey } : {},
    };
  }

  async similaritySearch(
    vector: number[],
    limit: number,
    filter: MetadataFilter,
  ): Promise<RetrievedDocument[]> {
    const must = Object.entries(filter).flatMap(([key, value]) =>
      value === undefined ? [] : [matchCondition(key, value)],
    );

    const res = await this.http.post<QdrantSearchResponse>(
      this.url('/points/search'),
      {
        vector,
        limit,
        with_payload: true,
        ...(must.length ? { filter: { must } } : {}),
      },
      this.requestOptions(),
    );

    const points = res.data.result ?? [];
    this.logger.debug(`[qdrant] hits=${points.length} limit=${limit} filters=${JSON.stringify(filter)}`);

    return points.map((point) => payloadToDocument(point.payload, point.score));
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    await this.http.put(
      `${this.url('/points')}?wait=true`,
      {
        points: points.map((point) => ({
          id: point.id,
          vector: point.vector,
          payload: { ...point.metadata, content: point.content },
        })),
      },
      this.requestOptions(),
    );
  }

  async ping(): Promise<void> {
    await this.http.get(this.url(''), this.requestOptions());
  }
}
