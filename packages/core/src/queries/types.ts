import type { QueryType } from '@spurn/shared/src/types/query.types.js';
import type { CorpusRepository } from '../repositories/corpus.repository.js';
import type { WordStatsRepository } from '../repositories/word-stats.repository.js';
import type { SimilarityClient } from '../services/similarity/types.js';
import type { Stemmer } from '../services/stemmer/stemmer.js';
import type { Query } from './query.js';

export interface QueryContext {
  readonly corpus: CorpusRepository;
  readonly wordStats: WordStatsRepository;
  readonly similarity: SimilarityClient;
  readonly stemmer: Stemmer;
  /** Reference time for recency weighting; defaults to the current time. */
  readonly now?: Date;
}

export interface HandlerResult {
  readonly answer: unknown;
  readonly voiceAnswer?: string;
}

export type QueryHandler = (query: Query, ctx: QueryContext, key: string) => Promise<HandlerResult>;

export type QueryHandlers = { readonly [K in QueryType]?: QueryHandler };
