import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { SearchTerm } from '@spurn/shared/src/types/query.types.js';
import type { SearchArticle, SimilarityClient, SimilarityResult } from './types.js';

const log = createChildLogger('similarity:mock');

/**
 * Gives every term the same weight and returns the given articles. Pass
 * `available: false` to simulate a service that answers without weights.
 */
export function createMockSimilarityClient(
  articles: readonly SearchArticle[] = [],
  options: { readonly available?: boolean } = {},
): SimilarityClient {
  log.info('Using mock similarity client');
  const available = options.available ?? true;

  return {
    listSimilarToTerms(terms: readonly SearchTerm[], limit: number): Promise<SimilarityResult> {
      log.debug({ termCount: terms.length, limit }, 'Mock similarity search');

      if (!available) {
        return Promise.resolve({ articles: [] });
      }
      return Promise.resolve({
        weights: terms.map(() => 1.0),
        articles: articles.slice(0, limit),
      });
    },
  };
}
