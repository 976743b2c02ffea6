import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { ParseResult } from '@spurn/shared/src/types/query.types.js';
import { InvariantViolation } from '@spurn/shared/src/utils/errors.js';
import type { Query } from './query.js';
import type { QueryContext, QueryHandlers } from './types.js';

const log = createChildLogger('queries:dispatcher');

export const E_QUERY_NOT_UNDERSTOOD = 'E_QUERY_NOT_UNDERSTOOD';
export const E_EXCEPTION = 'E_EXCEPTION';

/**
 * Runs the handler for the parsed query type and records the outcome on
 * `query`. Handler failures become an `E_EXCEPTION` error;
 * {@link InvariantViolation} is rethrown.
 */
export async function dispatchQuery(
  query: Query,
  parse: ParseResult,
  handlers: QueryHandlers,
  ctx: QueryContext,
): Promise<void> {
  const { qtype } = parse;
  if (!qtype) {
    log.info(
      { textLength: [...query.text].length, tokens: query.tokens.length },
      'Query not understood',
    );
    query.setError(E_QUERY_NOT_UNDERSTOOD);
    return;
  }

  const key = parse.qkey ?? '';
  query.setQtype(qtype);
  query.setKey(key);

  const handler = handlers[qtype];
  if (!handler) {
    log.warn({ qtype }, 'No handler registered for query type');
    query.setAnswer(`${qtype}: ${key}`);
    return;
  }

  try {
    const result = await handler(query, ctx, key);
    query.setAnswer(result.answer, result.voiceAnswer);
    log.info({ qtype, key }, 'Query answered');
  } catch (error) {
    if (error instanceof InvariantViolation) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ qtype, key, err: error }, 'Query handler failed');
    query.setError(`${E_EXCEPTION}: ${message}`);
  }
}
