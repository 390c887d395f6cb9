// src/retrieval/pgvector.backend.ts
import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { toSql } from 'pgvector';
import { assistantConfig, AssistantConfig } from '../config/assistant.config';
import type { LoggerService } from '../shared/types';
import { escapeRegex, normalizeMetadata } from './metadata';
import {
  MetadataFilter,
  RetrievedDocument,
  VectorBackend,
  VectorPoint,
} from './retrieval.types';

interface DocumentRow {
  content: string;
  metadata: unknown;
  score: number;
}

/**
 * Translates a metadata filter into SQL predicates over the `metadata` jsonb
 * column. Numeric sections match exactly; everything else is a
 * case-insensitive substring match, with `_` in law names read as a space.
 */
export function buildFilterClause(
  filter: MetadataFilter,
  firstParam: number,
): { sql: string; params: string[] } {
  const predicates: string[] = [];
  const params: string[] = [];
  let p = firstParam;

  if (filter.section !== undefined) {
    if (/^\d+$/.test(filter.section)) {
      predicates.push(`metadata->>'section' = $${p++}`);
      params.push(String(parseInt(filter.section, 10)));
    } else {
      predicates.push(`metadata->>'section' ~* $${p++}`);
      params.push(escapeRegex(filter.section));
    }
  }

  if (filter.law_name !== undefined) {
    predicates.push(`metadata->>'law_name' ~* $${p++}`);
    params.push(escapeRegex(filter.law_name.replace(/_/g, ' ')));
  }

  if (filter.title !== undefined) {
    predicates.push(`metadata->>'title' ~* $${p++}`);
    params.push(escapeRegex(filter.title));
  }

  return {
    sql: predicates.length ? `WHERE ${predicates.join(' AND ')}` : '',
    params,
  };
}

@Injectable()
export class PgVectorBackend implements VectorBackend {
  readonly name = 'pgvector';

  constructor(
    @Inject('PG_POOL') private readonly pool: Pool,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig,
    @Inject('LOGGER_SERVICE') private readonly logger: LoggerService,
  ) {}

  private get table(): string {
    return this.config.vector.documentsTable;
  }

  async similaritySearch(
    vector: number[],
    limit: number,
    filter: MetadataFilter,
  ): Promise<RetrievedDocument[]> {
    const where = buildFilterClause(filter, 3);
    const params: (string | number)[] = [toSql(vector), limit, ...where.params];

    // <=> is cosine distance; similarity = 1 - distance
    const sql = `
      SELECT
        content,
        metadata,
        1 - (embedding <=> $1::vector) AS score
      FROM ${this.table}
      ${where.sql}
      ORDER BY embedding <=> $1::vector
      LIMIT $2;
    `;

    const t0 = Date.now();
    const res = await this.pool.query<DocumentRow>(sql, params);
    const ms = Date.now() - t0;

    void this.logger.log(
      `[PG][vector] ms=${ms} rows=${res.rowCount} limit=${limit} filters=${JSON.stringify(filter)}`,
    );

    return res.rows.map((row) => ({
      content: row.content,
      metadata: normalizeMetadata(row.metadata),
      score: Number(row.score),
    }));
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const valuesSql: string[] = [];
      const params: string[] = [];
      let p = 1;

      for (const point of points) {
        valuesSql.push(`($${p++}, $${p++}, $${p++}::jsonb, $${p++}::vector)`);
        params.push(
          String(point.id),
          point.content,
          JSON.stringify(point.metadata),
          toSql(point.vector),
        );
      }

      await client.query(
        `
        INSERT INTO ${this.table} (id, content, metadata, embedding)
        VALUES ${valuesSql.join(', ')}
        ON CONFLICT (id) DO UPDATE
          SET content = EXCLUDED.content,
              metadata = EXCLUDED.metadata,
              embedding = EXCLUDED.embedding,
              updated_at = now();
        `,
        params,
      );

      await client.query('COMMIT');
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1;');
  }
}
