import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { QueryHandler } from '../types.js';
import { rankEntityDefinitions } from '../descriptions.js';
import { listArticles } from '../articles.js';

const log = createChildLogger('queries:entity');

export const entityHandler: QueryHandler = async (_query, ctx, name) => {
  const definitions = await rankEntityDefinitions(ctx.corpus, name, ctx.now);
  const sources = await listArticles(ctx.corpus, name);
  log.debug({ name, definitions: definitions.length }, 'Entity query resolved');

  const top = definitions[0];
  const voiceAnswer = top ? `${name} er ${top.answer}.` : `Ég veit ekki hvað ${name} er.`;
  return { answer: { answers: definitions, sources }, voiceAnswer };
};
