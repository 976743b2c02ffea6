import { createChildLogger } from '@spurn/shared/src/logger.js';
import { upperFirst } from '@spurn/shared/src/utils/text.js';
import type { QueryHandler } from '../types.js';
import { createBucketTable, appendNames } from '../../answers/mention-aggregator.js';
import { rankAnswers } from '../../answers/answer-ranker.js';

const log = createChildLogger('queries:title');

/** Who holds the title: persons whose title starts with it, and entities defined by it. */
export const titleHandler: QueryHandler = async (_query, ctx, title) => {
  const table = createBucketTable();
  appendNames(table, await ctx.corpus.personsByTitle(title.toLowerCase()));
  appendNames(table, await ctx.corpus.entitiesByDefinition(title));
  const ranked = rankAnswers(table, ctx.now);
  log.debug({ title, answers: ranked.length }, 'Title query resolved');

  const top = ranked[0];
  const voiceAnswer =
    top && title ? `${upperFirst(title)} er ${top.answer}.` : `Ég veit ekki hver er ${title}.`;
  return { answer: ranked, voiceAnswer };
};
