// src/ingestion/ingestion.service.ts
import fs from 'fs';
import path from 'path';

import { Inject, Injectable, Logger } from '@nestjs/common';
import { EmbeddingsService } from '../retrieval/embeddings.service';
import { VECTOR_BACKEND, VectorBackend, VectorPoint } from '../retrieval/retrieval.types';
import { errorMessage } from '../shared/errors';

export const INGEST_BATCH_SIZE = 50;

type LawSection = Record<string, unknown>;

export interface IngestionReport {
  files: number;
  sections: number;
  skippedFiles: string[];
  /** First id that was not used; pass it as `startId` to append another run. */
  nextId: number;
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? '';
}

/** `key: value | key: value`, in the section's own field order. */
export function toEmbeddingText(section: LawSection): string {
  return Object.entries(section)
    .map(([key, value]) => `${key}: ${stringify(value)}`)
    .join(' | ');
}

export function toMetadata(section: LawSection, lawName: string): Record<string, string> {
  const metadata: Record<string, string> = { law_name: lawName };
  for (const [key, value] of Object.entries(section)) {
    metadata[key] = stringify(value);
  }
  return metadata;
}

function isSection(value: unknown): value is LawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly embeddings: EmbeddingsService,
    @Inject(VECTOR_BACKEND) private readonly backend: VectorBackend,
  ) {}

  /**
   * Loads every `*.json` file of `dir` (an array of section objects per law)
   * into the configured vector backend. Ids are sequential across files.
   * Files that are not a JSON array are skipped; embedding and backend
   * failures abort the run.
   */
  async ingestDirectory(
    dir: string,
    opts: { startId?: number; batchSize?: number } = {},
  ): Promise<IngestionReport> {
    const batchSize = opts.batchSize ?? INGEST_BATCH_SIZE;
    const files = fs
      .readdirSync(dir)
      .filter((f) => f.toLowerCase().endsWith('.json'))
      .sort();

    const report: IngestionReport = {
      files: 0,
      sections: 0,
      skippedFiles: [],
      nextId: opts.startId ?? 1,
    };

    for (const file of files) {
      const sections = this.readSections(path.join(dir, file));
      if (!sections) {
        report.skippedFiles.push(file);
        continue;
      }

      const lawName = path.basename(file, path.extname(file));
      this.logger.log(`${file}: ${sections.length} section(s) on ${this.backend.name}`);

      for (let i = 0; i < sections.length; i += batchSize) {
        const batch = sections.slice(i, i + batchSize);
        const texts = batch.map(toEmbeddingText);
        const vectors = await this.embeddings.embedMany(texts);

        const points: VectorPoint[] = batch.map((section, j) => ({
          id: report.nextId + j,
          vector: vectors[j],
          content: texts[j],
          metadata: toMetadata(section, lawName),
        }));

        await this.backend.upsert(points);
        report.nextId += batch.length;
        report.sections += batch.length;
        this.logger.log(
          `  -> ${file}: upserted ${Math.min(i + batchSize, sections.length)}/${sections.length}`,
        );
      }

      report.files += 1;
    }

    this.logger.log(
      `Done. files=${report.files} sections=${report.sections} skipped=${report.skippedFiles.length}`,
    );
    return report;
  }

  private readSections(filePath: string): LawSection[] | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
      this.logger.warn(`${path.basename(filePath)}: unreadable JSON (${errorMessage(e)}), skipping`);
      return null;
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`${path.basename(filePath)}: expected an array of sections, skipping`);
      return null;
    }
    return parsed.filter(isSection);
  }
}
