import type { QueryToken, SearchTerm } from '@spurn/shared/src/types/query.types.js';

/** Category for word tokens that arrive without morphological analysis. */
export const UNANALYZED_CATEGORY = 'x';

export interface Stemmer {
  stemsOfToken(token: QueryToken): readonly SearchTerm[];
}

/**
 * Uses the stems the tokenizer attached to a word. A word token without any
 * falls back to its lowercased text; a token with an empty stem list
 * contributes nothing.
 */
export function createTokenStemmer(): Stemmer {
  return {
    stemsOfToken(token: QueryToken): readonly SearchTerm[] {
      switch (token.kind) {
        case 'word':
          return token.stems ?? [{ stem: token.text.toLowerCase(), category: UNANALYZED_CATEGORY }];
        case 'person': {
          const gender = token.names[0]?.gender ?? 'hk';
          return [{ stem: token.text, category: `person_${gender}` }];
        }
        case 'entity':
          return [{ stem: token.text, category: 'entity' }];
        case 'punctuation':
          return [];
      }
    },
  };
}
