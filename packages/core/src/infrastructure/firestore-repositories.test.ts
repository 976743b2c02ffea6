import { describe, it, expect, vi } from 'vitest';
import type { Firestore } from '@google-cloud/firestore';
import { PersistenceError } from '@spurn/shared/src/utils/errors.js';
import { createFirestoreCorpusRepository } from './firestore-corpus.repository.js';
import { createFirestoreWordStatsRepository } from './firestore-word-stats.repository.js';

/** A Firestore whose every query and document read fails. */
function createUnavailableDb(): Firestore {
  const failingGet = vi.fn(() => Promise.reject(new Error('14 UNAVAILABLE')));
  const query: Record<string, unknown> = { get: failingGet };
  query['where'] = vi.fn(() => query);
  query['orderBy'] = vi.fn(() => query);
  query['limit'] = vi.fn(() => query);

  return {
    collection: vi.fn(() => ({
      ...query,
      doc: vi.fn(() => ({ get: failingGet })),
    })),
  } as unknown as Firestore;
}

describe('Firestore repository read failures', () => {
  it('should report a failed article lookup as a PersistenceError', async () => {
    const repo = createFirestoreCorpusRepository(createUnavailableDb());

    await expect(repo.articlesMentioning('Már Guðmundsson', 20)).rejects.toThrow(PersistenceError);
    await expect(repo.articlesMentioning('Már Guðmundsson', 20)).rejects.toThrow(
      'Article lookup failed: 14 UNAVAILABLE',
    );
  });

  it('should report a failed title lookup as a PersistenceError', async () => {
    const repo = createFirestoreCorpusRepository(createUnavailableDb());

    await expect(repo.personTitles('Már Guðmundsson')).rejects.toThrow(
      'Corpus lookup failed: 14 UNAVAILABLE',
    );
  });

  it('should report failed word stats reads as PersistenceErrors', async () => {
    const repo = createFirestoreWordStatsRepository(createUnavailableDb());

    await expect(repo.articleCount('hestur')).rejects.toThrow(PersistenceError);
    await expect(repo.relatedWords('hestur')).rejects.toThrow(
      'Word stats lookup failed: 14 UNAVAILABLE',
    );
  });
});
