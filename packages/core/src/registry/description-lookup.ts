import { correctSpaces } from '@spurn/shared/src/utils/text.js';
import type { CorpusRepository } from '../repositories/corpus.repository.js';
import { rankEntityDefinitions, rankPersonTitles } from '../queries/descriptions.js';

/** Best known description of a name, or an empty string when there is none. */
export interface DescriptionLookup {
  personTitle(name: string): Promise<string>;
  entityDefinition(name: string): Promise<string>;
}

export function createCorpusDescriptionLookup(corpus: CorpusRepository, now?: Date): DescriptionLookup {
  return {
    async personTitle(name: string): Promise<string> {
      const [top] = await rankPersonTitles(corpus, name, now);
      return top ? correctSpaces(top.answer) : '';
    },
    async entityDefinition(name: string): Promise<string> {
      const [top] = await rankEntityDefinitions(corpus, name, now);
      return top ? correctSpaces(top.answer) : '';
    },
  };
}
