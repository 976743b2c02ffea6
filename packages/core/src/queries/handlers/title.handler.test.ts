import { describe, it, expect, beforeEach } from 'vitest';
import {
  createInMemoryCorpusRepository,
  type InMemoryCorpusRepository,
} from '../../repositories/in-memory-corpus.repository.js';
import { article, createTestContext } from '../../test-helpers.js';
import { createQuery } from '../query.js';
import { titleHandler } from './title.handler.js';

describe('titleHandler', () => {
  let corpus: InMemoryCorpusRepository;

  beforeEach(() => {
    corpus = createInMemoryCorpusRepository();
    corpus.addArticle(article('a1', 5));
    corpus.addArticle(article('a2', 2));
    corpus.addArticle(article('a3', 3));
  });

  it('should merge spellings of one name and answer with the most specific', async () => {
    corpus.addPerson({ name: 'Már Guðmundsson', title: 'seðlabankastjóri', articleId: 'a2' });
    corpus.addPerson({ name: 'Ásgeir Jónsson', title: 'seðlabankastjóri Íslands', articleId: 'a3' });
    corpus.addPerson({ name: 'Már G. Guðmundsson', title: 'Seðlabankastjóri', articleId: 'a1' });

    const result = await titleHandler(
      createQuery('hver er seðlabankastjóri'),
      createTestContext({ corpus }),
      'seðlabankastjóri',
    );

    expect(result.voiceAnswer).toBe('Seðlabankastjóri er Már G. Guðmundsson.');
    expect(result.answer).toMatchObject([
      { answer: 'Már G. Guðmundsson', sources: [{ uuid: 'a1' }, { uuid: 'a2' }] },
      { answer: 'Ásgeir Jónsson', sources: [{ uuid: 'a3' }] },
    ]);
  });

  it('should include entities defined by the title', async () => {
    corpus.addEntity({ name: 'Alþingi', verb: 'er', definition: 'löggjafarþing', articleId: 'a1' });

    const result = await titleHandler(
      createQuery('hvað er löggjafarþing'),
      createTestContext({ corpus }),
      'löggjafarþing',
    );

    expect(result.voiceAnswer).toBe('Löggjafarþing er Alþingi.');
  });

  it('should admit to not knowing who holds an unknown title', async () => {
    const result = await titleHandler(
      createQuery('hver er ritstjóri'),
      createTestContext({ corpus }),
      'ritstjóri',
    );

    expect(result.voiceAnswer).toBe('Ég veit ekki hver er ritstjóri.');
    expect(result.answer).toEqual([]);
  });
});
