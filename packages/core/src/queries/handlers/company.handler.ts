import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { QueryHandler } from '../types.js';
import { createBucketTable, appendAnswers } from '../../answers/mention-aggregator.js';
import { rankAnswers } from '../../answers/answer-ranker.js';

const log = createChildLogger('queries:company');

/** `Eimskip hf.` and `Eimskip hf` both become the prefix `Eimskip hf`. */
export function companyNamePrefix(name: string): string {
  return name.trim().replace(/\.+$/, '');
}

export const companyHandler: QueryHandler = async (_query, ctx, name) => {
  const prefix = companyNamePrefix(name);
  const table = createBucketTable();
  appendAnswers(table, await ctx.corpus.entitiesByNamePrefix(prefix));
  const ranked = rankAnswers(table, ctx.now);
  log.debug({ name, prefix, answers: ranked.length }, 'Company query resolved');

  const top = ranked[0];
  const voiceAnswer = top ? `${name} er ${top.answer}.` : `Ég veit ekki hvað ${name} er.`;
  return { answer: ranked, voiceAnswer };
};
