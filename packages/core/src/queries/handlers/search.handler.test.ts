import { describe, it, expect, vi } from 'vitest';
import type { QueryToken } from '@spurn/shared/src/types/query.types.js';
import { InvariantViolation, ServiceUnavailableError } from '@spurn/shared/src/utils/errors.js';
import type { SearchArticle, SimilarityClient } from '../../services/similarity/types.js';
import { createTestContext } from '../../test-helpers.js';
import { createQuery } from '../query.js';
import { searchHandler } from './search.handler.js';

const TOKENS: QueryToken[] = [
  { kind: 'word', text: 'Hvar', stems: [] },
  {
    kind: 'word',
    text: 'veðurspá',
    stems: [
      { stem: 'veður', category: 'hk' },
      { stem: 'spá', category: 'kvk' },
    ],
  },
  { kind: 'word', text: 'hestar', stems: [{ stem: 'hestur', category: 'kk' }] },
  { kind: 'punctuation', text: '?' },
];

const ARTICLE: SearchArticle = {
  uuid: 'a1',
  heading: 'Hestar í roki',
  ts: '2026-10-17T10:00',
  domain: 'example.is',
  url: 'https://example.is/a1',
  similarity: 0.7,
};

function similarityReturning(weights: number[] | undefined): SimilarityClient {
  return {
    listSimilarToTerms: vi.fn().mockResolvedValue({ weights, articles: [ARTICLE] }),
  };
}

describe('searchHandler', () => {
  it('should spread the term weights back over the tokens', async () => {
    const similarity = similarityReturning([1.0, 0.5, 0.25]);
    const query = createQuery('Hvar veðurspá hestar?', TOKENS);

    const result = await searchHandler(query, createTestContext({ similarity }), '');

    expect(similarity.listSimilarToTerms).toHaveBeenCalledWith(
      [
        { stem: 'veður', category: 'hk' },
        { stem: 'spá', category: 'kvk' },
        { stem: 'hestur', category: 'kk' },
      ],
      20,
    );
    expect(result.answer).toEqual({
      answers: [ARTICLE],
      weights: [
        { x: 'Hvar', w: 0 },
        { x: 'veðurspá', w: 0.75 },
        { x: 'hestar', w: 0.25 },
        { x: '?', w: 0 },
      ],
    });
  });

  it('should fail as unavailable when no weights come back', async () => {
    const query = createQuery('Hvar veðurspá hestar?', TOKENS);

    await expect(
      searchHandler(query, createTestContext({ similarity: similarityReturning(undefined) }), ''),
    ).rejects.toThrow(new ServiceUnavailableError('Unable to connect to the similarity server', 'similarity'));
  });

  it('should treat an empty weight list as unavailable', async () => {
    const query = createQuery('Hvar veðurspá hestar?', TOKENS);

    await expect(
      searchHandler(query, createTestContext({ similarity: similarityReturning([]) }), ''),
    ).rejects.toThrow(ServiceUnavailableError);
  });

  it('should raise an invariant violation when weights and terms disagree', async () => {
    const query = createQuery('Hvar veðurspá hestar?', TOKENS);

    await expect(
      searchHandler(query, createTestContext({ similarity: similarityReturning([1.0, 0.5]) }), ''),
    ).rejects.toThrow(InvariantViolation);
  });
});
