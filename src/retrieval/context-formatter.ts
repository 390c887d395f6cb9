// src/retrieval/context-formatter.ts
import { parseMetadataFilters } from './metadata';
import { RetrievedDocument } from './retrieval.types';

export const MAX_DOCUMENT_CHARS = 1000;
const MAX_SUMMARY_VALUES = 5;

function titleCase(key: string): string {
  return key.charAt(0).toUpperCase() + key.slice(1);
}

/**
 * Renders retrieved documents as the context block handed to the LLM:
 * query and filters, one entry per document with score, source metadata and
 * (truncated) content, then an average score and metadata overview.
 */
export function formatRetrievedDocuments(query: string, documents: RetrievedDocument[]): string {
  const { filters } = parseMetadataFilters(query);
  const lines: string[] = [`SEARCH QUERY: ${query}`];

  const filterEntries = Object.entries(filters);
  if (filterEntries.length) {
    lines.push('METADATA FILTERS:');
    for (const [field, value] of filterEntries) lines.push(`- ${field}: ${value}`);
  }

  lines.push(`FOUND ${documents.length} RELEVANT LEGAL DOCUMENTS:`, '');

  documents.forEach((doc, i) => {
    lines.push(`--- DOCUMENT ${i + 1} ---`);
    lines.push(`Similarity Score: ${doc.score.toFixed(4)}`);

    const source = Object.entries(doc.metadata)
      .filter(([key, value]) => key && value !== '')
      .map(([key, value]) => `${titleCase(key)}: ${value}`);
    if (source.length) lines.push(`Source: ${source.join(' | ')}`);

    let content = doc.content.trim();
    if (content.length > MAX_DOCUMENT_CHARS) {
      content = `${content.slice(0, MAX_DOCUMENT_CHARS)}... [Content truncated]`;
    }
    lines.push(`Content:\n${content}`, '');
  });

  lines.push('--- SEARCH SUMMARY ---');
  lines.push(`Total documents found: ${documents.length}`);

  if (documents.length) {
    const average = documents.reduce((sum, doc) => sum + doc.score, 0) / documents.length;
    lines.push(`Average similarity score: ${average.toFixed(4)}`);

    const overview = new Map<string, Set<string>>();
    for (const doc of documents) {
      for (const [key, value] of Object.entries(doc.metadata)) {
        const values = overview.get(key) ?? new Set<string>();
        values.add(String(value));
        overview.set(key, values);
      }
    }

    if (overview.size) {
      lines.push('METADATA SUMMARY:');
      for (const [key, values] of overview) {
        lines.push(
          values.size <= MAX_SUMMARY_VALUES
            ? `- ${key}: ${[...values].sort().join(', ')}`
            : `- ${key}: ${values.size} unique values`,
        );
      }
    }
  }

  return lines.join('\n');
}
