import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { SearchTerm } from '@spurn/shared/src/types/query.types.js';
import { InvariantViolation, ServiceUnavailableError } from '@spurn/shared/src/utils/errors.js';
import type { QueryHandler } from '../types.js';
import { MAX_ANSWERS } from '../../answers/answer-ranker.js';

const log = createChildLogger('queries:search');

export interface TokenWeight {
  readonly x: string;
  w: number;
}

/**
 * Sends the stems of every query token to the similarity service and
 * spreads the returned per-term weights back over the tokens: a token's
 * weight is the mean weight of its stems, or 0 if it has none.
 */
export const searchHandler: QueryHandler = async (query, ctx) => {
  const terms: SearchTerm[] = [];
  const weights: TokenWeight[] = [];
  const fixups: { readonly weight: TokenWeight; readonly count: number }[] = [];

  for (const token of query.tokens) {
    const weight: TokenWeight = { x: token.text, w: 0.0 };
    weights.push(weight);
    const stems = ctx.stemmer.stemsOfToken(token);
    if (stems.length > 0) {
      terms.push(...stems);
      fixups.push({ weight, count: stems.length });
    }
  }

  const stemCount = fixups.reduce((sum, f) => sum + f.count, 0);
  if (stemCount !== terms.length) {
    throw new InvariantViolation(`Stem count ${stemCount} does not match ${terms.length} search terms`);
  }

  log.debug({ terms: terms.length }, 'Launching similarity search');
  const result = await ctx.similarity.listSimilarToTerms(terms, MAX_ANSWERS);

  const termWeights = result.weights;
  if (!termWeights || termWeights.length === 0) {
    throw new ServiceUnavailableError('Unable to connect to the similarity server', 'similarity');
  }
  if (termWeights.length !== terms.length) {
    throw new InvariantViolation(
      `Similarity service returned ${termWeights.length} weights for ${terms.length} terms`,
    );
  }

  let index = 0;
  for (const { weight, count } of fixups) {
    const slice = termWeights.slice(index, index + count);
    weight.w = slice.reduce((sum, w) => sum + w, 0) / count;
    index += count;
  }

  return { answer: { answers: result.articles, weights } };
};
