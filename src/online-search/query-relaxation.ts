// src/online-search/query-relaxation.ts

export interface QueryRelaxationStrategy {
  readonly name: string;
  apply(query: string, domains: readonly string[]): string;
}

/** Tried in order, one per search attempt, always against the user's query. */
export const DEFAULT_RELAXATION_STRATEGIES: readonly QueryRelaxationStrategy[] = [
  {
    name: 'original',
    apply: (query) => query,
  },
  {
    name: 'site-restricted',
    apply: (query, domains) =>
      `${domains.map((domain) => `site:${domain}`).join(' OR ')} ${query}`,
  },
  {
    name: 'first-keywords',
    apply: (query, domains) =>
      `${query.split(/\s+/).filter(Boolean).slice(0, 3).join(' ')} site:${domains[0]}`,
  },
];
