// src/retrieval/metadata.ts
import { FilterField, MetadataValue, ParsedQuery } from './retrieval.types';

export const FILTER_ALIASES: Record<FilterField, readonly string[]> = {
  section: ['section', 'sec', 's'],
  law_name: ['law', 'act', 'law_name', 'statute'],
  title: ['title', 'heading', 'name'],
};

const FILTER_FIELDS: readonly FilterField[] = ['section', 'law_name', 'title'];
const SEPARATORS = [':', '='];

function stripQuotes(value: string): string {
  return value.replace(/^["']|["']$/g, '');
}

/**
 * Pulls `field:value` / `field=value` tokens out of a free-text query.
 * Aliases are case-insensitive and must start a word; values may be quoted
 * to include spaces. The first match per field wins; every matched token is
 * removed. Unknown `key:value` tokens stay in the text.
 */
export function parseMetadataFilters(query: string): ParsedQuery {
  const filters: ParsedQuery['filters'] = {};
  let text = query;

  for (const field of FILTER_FIELDS) {
    for (const alias of FILTER_ALIASES[field]) {
      for (const separator of SEPARATORS) {
        const pattern = new RegExp(
          `(^|\\s)${alias}${separator}("[^"]*"|'[^']*'|\\S+)`,
          'gi',
        );
        text = text.replace(pattern, (_match, lead: string, raw: string) => {
          const value = stripQuotes(raw).trim();
          if (value && filters[field] === undefined) {
            filters[field] = value;
          }
          return lead;
        });
      }
    }
  }

  return { text: text.split(/\s+/).filter(Boolean).join(' '), filters };
}

/** Keeps scalar metadata values; drops nested objects and nulls. */
export function normalizeMetadata(raw: unknown): Record<string, MetadataValue> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return {};

  const out: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number') {
      out[key] = value;
    } else if (typeof value === 'boolean') {
      out[key] = String(value);
    }
  }
  return out;
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
