import type { SearchTerm } from '@spurn/shared/src/types/query.types.js';

export interface SearchArticle {
  readonly uuid: string;
  readonly heading: string;
  readonly ts: string;
  readonly domain: string;
  readonly url: string;
  readonly similarity: number;
}

export interface SimilarityResult {
  /** One weight per input term; missing or empty when the service could not answer. */
  readonly weights?: readonly number[];
  readonly articles: readonly SearchArticle[];
}

export interface SimilarityClient {
  listSimilarToTerms(terms: readonly SearchTerm[], limit: number): Promise<SimilarityResult>;
}
