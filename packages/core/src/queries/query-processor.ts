import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { QueryRecord } from '@spurn/shared/src/types/query.types.js';
import type { QueryInput } from '@spurn/schemas/src/query.schema.js';
import type { MorphologyClient } from '../services/morphology/types.js';
import type { QueryContext, QueryHandlers } from './types.js';
import { createQuery } from './query.js';
import { dispatchQuery } from './dispatcher.js';
import { handlePlainText } from './plain-text.js';
import { createBuiltinHandlers } from './builtin-handlers.js';

const log = createChildLogger('queries:processor');

export interface QueryProcessorDeps extends Omit<QueryContext, 'now'> {
  readonly morphology: MorphologyClient;
  readonly plainTextTtlHours: number;
  readonly handlers?: QueryHandlers;
  /** Clock used for recency weighting and answer expiry. */
  readonly clock?: () => Date;
}

export interface QueryProcessor {
  process(input: QueryInput): Promise<QueryRecord>;
}

/**
 * Word questions (spelling, declension) are answered from the raw text;
 * everything else goes through the parse result to a query handler.
 */
export function createQueryProcessor(deps: QueryProcessorDeps): QueryProcessor {
  const handlers = deps.handlers ?? createBuiltinHandlers();
  const clock = deps.clock ?? ((): Date => new Date());

  return {
    async process(input: QueryInput): Promise<QueryRecord> {
      const now = clock();
      const query = createQuery(input.text, input.tokens);

      const handled = await handlePlainText(query, {
        morphology: deps.morphology,
        ttlHours: deps.plainTextTtlHours,
        now,
      });

      if (!handled) {
        const ctx: QueryContext = {
          corpus: deps.corpus,
          wordStats: deps.wordStats,
          similarity: deps.similarity,
          stemmer: deps.stemmer,
          now,
        };
        await dispatchQuery(query, input.parse ?? {}, handlers, ctx);
      }

      const record = query.toJSON();
      log.debug({ status: record.status, qtype: record.qtype }, 'Query processed');
      return record;
    },
  };
}
