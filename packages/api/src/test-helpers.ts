import type { OpenAPIHono } from '@hono/zod-openapi';
import { createInMemoryCorpusRepository } from '@spurn/core/src/repositories/in-memory-corpus.repository.js';
import type { InMemoryCorpusRepository } from '@spurn/core/src/repositories/in-memory-corpus.repository.js';
import { createInMemoryWordStatsRepository } from '@spurn/core/src/repositories/in-memory-word-stats.repository.js';
import type { WordStats } from '@spurn/core/src/repositories/in-memory-word-stats.repository.js';
import { createMockSimilarityClient } from '@spurn/core/src/services/similarity/mock-similarity-client.js';
import type { SimilarityClient } from '@spurn/core/src/services/similarity/types.js';
import { createInMemoryLexicon } from '@spurn/core/src/services/morphology/in-memory-lexicon.js';
import { createTokenStemmer } from '@spurn/core/src/services/stemmer/stemmer.js';
import { createQueryProcessor } from '@spurn/core/src/queries/query-processor.js';
import type { QueryHandlers } from '@spurn/core/src/queries/types.js';
import { createCorpusDescriptionLookup } from '@spurn/core/src/registry/description-lookup.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_NOW = new Date('2026-10-18T12:00:00Z');

export interface TestAppOptions {
  readonly corpus?: InMemoryCorpusRepository;
  readonly wordStats?: readonly WordStats[];
  readonly similarity?: SimilarityClient;
  readonly handlers?: QueryHandlers;
}

/**
 * Creates the app over in-memory repositories and mock clients, with the
 * clock fixed at {@link TEST_NOW}. For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): OpenAPIHono<AppEnv> {
  const corpus = options.corpus ?? createInMemoryCorpusRepository();

  const queryProcessor = createQueryProcessor({
    corpus,
    wordStats: createInMemoryWordStatsRepository(options.wordStats),
    similarity: options.similarity ?? createMockSimilarityClient(),
    stemmer: createTokenStemmer(),
    morphology: createInMemoryLexicon([
      { nominative: 'hestur', accusative: 'hest', dative: 'hesti', genitive: 'hests' },
    ]),
    plainTextTtlHours: 24,
    handlers: options.handlers,
    clock: () => TEST_NOW,
  });

  return createApp({
    version: '0.1.0',
    queryProcessor,
    descriptionLookup: createCorpusDescriptionLookup(corpus, TEST_NOW),
  });
}
