import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { QueryHandler } from '../types.js';
import { rankPersonTitles } from '../descriptions.js';
import { listArticles } from '../articles.js';

const log = createChildLogger('queries:person');

export const personHandler: QueryHandler = async (_query, ctx, name) => {
  const titles = await rankPersonTitles(ctx.corpus, name, ctx.now);
  const sources = await listArticles(ctx.corpus, name);
  log.debug({ name, titles: titles.length, sources: sources.length }, 'Person query resolved');

  const top = titles[0];
  const voiceAnswer = top ? `${name} er ${top.answer}.` : `Ég veit ekki hver ${name} er.`;
  return { answer: { answers: titles, sources }, voiceAnswer };
};
