import type { RankedAnswer } from '@spurn/shared/src/types/mention.types.js';
import type { CorpusRepository } from '../repositories/corpus.repository.js';
import { createBucketTable, appendAnswers } from '../answers/mention-aggregator.js';
import { rankAnswers } from '../answers/answer-ranker.js';

/**
 * Titles of the person `name`, together with any entity definitions under the
 * same name. Titles are bucketed by their exact text: two titles sharing their
 * first and last words are still different titles.
 */
export async function rankPersonTitles(
  corpus: CorpusRepository,
  name: string,
  now?: Date,
): Promise<RankedAnswer[]> {
  const table = createBucketTable();
  appendAnswers(table, await corpus.personTitles(name));
  appendAnswers(table, await corpus.entityDefinitions(name));
  return rankAnswers(table, now);
}

export async function rankEntityDefinitions(
  corpus: CorpusRepository,
  name: string,
  now?: Date,
): Promise<RankedAnswer[]> {
  const table = createBucketTable();
  appendAnswers(table, await corpus.entityDefinitions(name));
  return rankAnswers(table, now);
}
