import { describe, it, expect } from 'vitest';
import { createInMemoryLexicon } from './in-memory-lexicon.js';

const HESTUR = { nominative: 'hestur', accusative: 'hest', dative: 'hesti', genitive: 'hests' };
const REYKJAVIK = {
  nominative: 'Reykjavík',
  accusative: 'Reykjavík',
  dative: 'Reykjavík',
  genitive: 'Reykjavíkur',
};

describe('createInMemoryLexicon', () => {
  const lexicon = createInMemoryLexicon([HESTUR, REYKJAVIK]);

  it('should find an entry by its nominative form', async () => {
    expect(await lexicon.lookupDeclension('hestur')).toEqual(HESTUR);
  });

  it('should find an entry by an inflected form', async () => {
    expect(await lexicon.lookupDeclension('hesti')).toEqual(HESTUR);
  });

  it('should retry with a capitalized first letter', async () => {
    expect(await lexicon.lookupDeclension('reykjavíkur')).toEqual(REYKJAVIK);
  });

  it('should return null for unknown words', async () => {
    expect(await lexicon.lookupDeclension('blörp')).toBeNull();
  });
});
