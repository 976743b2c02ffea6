import type { CorpusArticle } from './repositories/in-memory-corpus.repository.js';
import { createInMemoryCorpusRepository } from './repositories/in-memory-corpus.repository.js';
import { createInMemoryWordStatsRepository } from './repositories/in-memory-word-stats.repository.js';
import { createMockSimilarityClient } from './services/similarity/mock-similarity-client.js';
import { createTokenStemmer } from './services/stemmer/stemmer.js';
import type { QueryContext } from './queries/types.js';

export const NOW = new Date('2026-10-18T12:00:00Z');

/** A visible article published at 08:00 UTC on the given day of October 2026. */
export function article(id: string, day: number, overrides: Partial<CorpusArticle> = {}): CorpusArticle {
  return {
    id,
    heading: `Frétt ${id}`,
    timestamp: new Date(Date.UTC(2026, 9, day, 8, 0)),
    domain: 'example.is',
    url: `https://example.is/${id}`,
    visible: true,
    names: [],
    ...overrides,
  };
}

export function createTestContext(overrides: Partial<QueryContext> = {}): QueryContext {
  return {
    corpus: createInMemoryCorpusRepository(),
    wordStats: createInMemoryWordStatsRepository(),
    similarity: createMockSimilarityClient(),
    stemmer: createTokenStemmer(),
    now: NOW,
    ...overrides,
  };
}
