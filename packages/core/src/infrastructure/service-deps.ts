import { resolve } from 'node:path';
import type { ServiceConfig } from '@spurn/schemas/src/service-config.schema.js';
import type { CorpusSeed } from '@spurn/schemas/src/query.schema.js';
import { loadCorpusSeed } from '@spurn/schemas/src/config-loader.js';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { CorpusRepository } from '../repositories/corpus.repository.js';
import type { WordStatsRepository } from '../repositories/word-stats.repository.js';
import { createInMemoryCorpusRepository } from '../repositories/in-memory-corpus.repository.js';
import { createInMemoryWordStatsRepository } from '../repositories/in-memory-word-stats.repository.js';
import type { SimilarityClient } from '../services/similarity/types.js';
import { createSimilarityClient } from '../services/similarity/similarity-client.js';
import { createMockSimilarityClient } from '../services/similarity/mock-similarity-client.js';
import type { MorphologyClient } from '../services/morphology/types.js';
import { createMorphologyClient } from '../services/morphology/morphology-client.js';
import { createInMemoryLexicon } from '../services/morphology/in-memory-lexicon.js';
import { createTokenStemmer } from '../services/stemmer/stemmer.js';
import { createQueryProcessor, type QueryProcessor } from '../queries/query-processor.js';
import { createCorpusDescriptionLookup, type DescriptionLookup } from '../registry/description-lookup.js';
import { createFirestoreClient } from './firestore-client.js';
import { createFirestoreCorpusRepository } from './firestore-corpus.repository.js';
import { createFirestoreWordStatsRepository } from './firestore-word-stats.repository.js';

const log = createChildLogger('infrastructure:deps');

export interface ServiceDeps {
  readonly corpus: CorpusRepository;
  readonly wordStats: WordStatsRepository;
  readonly similarity: SimilarityClient;
  readonly morphology: MorphologyClient;
  readonly queryProcessor: QueryProcessor;
  readonly descriptionLookup: DescriptionLookup;
}

export interface ServiceDepsOptions {
  /** Directory that relative paths in the config resolve against. */
  readonly baseDir: string;
}

const EMPTY_SEED: CorpusSeed = { articles: [], persons: [], entities: [], words: [], lexicon: [] };

export async function createServiceDeps(
  config: ServiceConfig,
  options: ServiceDepsOptions,
): Promise<ServiceDeps> {
  const seed = config.corpus.seedFile
    ? await loadCorpusSeed(resolve(options.baseDir, config.corpus.seedFile))
    : EMPTY_SEED;

  let corpus: CorpusRepository;
  let wordStats: WordStatsRepository;
  if (config.corpus.backend === 'firestore') {
    const db = createFirestoreClient(config.corpus.gcpProjectId);
    corpus = createFirestoreCorpusRepository(db);
    wordStats = createFirestoreWordStatsRepository(db);
  } else {
    corpus = createInMemoryCorpusRepository(seed);
    wordStats = createInMemoryWordStatsRepository(seed.words);
  }
  log.info({ backend: config.corpus.backend, seeded: seed.articles.length }, 'Corpus ready');

  let similarity: SimilarityClient;
  if (config.similarity.baseUrl) {
    similarity = createSimilarityClient(config.similarity);
  } else {
    log.warn('No similarity service configured, searches will report it unavailable');
    similarity = createMockSimilarityClient([], { available: false });
  }

  const morphology = config.morphology.baseUrl
    ? createMorphologyClient(config.morphology)
    : createInMemoryLexicon(seed.lexicon);

  const queryProcessor = createQueryProcessor({
    corpus,
    wordStats,
    similarity,
    stemmer: createTokenStemmer(),
    morphology,
    plainTextTtlHours: config.answers.plainTextTtlHours,
  });

  return {
    corpus,
    wordStats,
    similarity,
    morphology,
    queryProcessor,
    descriptionLookup: createCorpusDescriptionLookup(corpus),
  };
}
