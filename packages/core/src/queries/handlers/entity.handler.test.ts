import { describe, it, expect } from 'vitest';
import { createInMemoryCorpusRepository } from '../../repositories/in-memory-corpus.repository.js';
import { article, createTestContext } from '../../test-helpers.js';
import { createQuery } from '../query.js';
import { entityHandler } from './entity.handler.js';

describe('entityHandler', () => {
  it('should answer with the best ranked definition and the articles', async () => {
    const corpus = createInMemoryCorpusRepository();
    corpus.addArticle(article('a1', 5, { names: ['Alþingi'] }));
    corpus.addArticle(article('a2', 2, { names: ['Alþingi'] }));
    corpus.addEntity({ name: 'Alþingi', verb: 'er', definition: 'löggjafarþing  Íslendinga', articleId: 'a1' });
    corpus.addEntity({ name: 'Alþingi', verb: 'er', definition: 'löggjafarþing Íslendinga', articleId: 'a2' });

    const result = await entityHandler(createQuery('hvað er Alþingi'), createTestContext({ corpus }), 'Alþingi');

    expect(result.voiceAnswer).toBe('Alþingi er löggjafarþing Íslendinga.');
    expect(result.answer).toMatchObject({
      answers: [{ answer: 'löggjafarþing Íslendinga', sources: [{ uuid: 'a1' }, { uuid: 'a2' }] }],
      sources: [{ uuid: 'a1' }, { uuid: 'a2' }],
    });
  });

  it('should admit to not knowing an unknown entity', async () => {
    const result = await entityHandler(createQuery('hvað er Blörp'), createTestContext(), 'Blörp');

    expect(result.voiceAnswer).toBe('Ég veit ekki hvað Blörp er.');
  });
});
