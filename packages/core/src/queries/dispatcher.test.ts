import { describe, it, expect, vi } from 'vitest';
import { InvariantViolation, PersistenceError } from '@spurn/shared/src/utils/errors.js';
import { createTestContext } from '../test-helpers.js';
import { createQuery } from './query.js';
import { dispatchQuery, E_QUERY_NOT_UNDERSTOOD } from './dispatcher.js';
import type { QueryHandlers } from './types.js';

const log = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock('@spurn/shared/src/logger.js', () => ({
  createChildLogger: () => log,
}));

describe('dispatchQuery', () => {
  it('should record a not-understood error without a query type', async () => {
    const query = createQuery('hvað segirðu gott');

    await dispatchQuery(query, {}, {}, createTestContext());

    expect(query.toJSON()).toMatchObject({
      status: 'errored',
      error: E_QUERY_NOT_UNDERSTOOD,
      qtype: null,
      key: null,
    });
  });

  it('should log the shape of a query that was not understood', async () => {
    log.info.mockClear();
    const query = createQuery('hvað segirðu gott', [
      { kind: 'word', text: 'hvað' },
      { kind: 'word', text: 'segirðu' },
      { kind: 'word', text: 'gott' },
    ]);

    await dispatchQuery(query, {}, {}, createTestContext());

    expect(log.info).toHaveBeenCalledWith({ textLength: 17, tokens: 3 }, 'Query not understood');
  });

  it('should answer with the type and key when no handler is registered', async () => {
    const query = createQuery('hestur');

    await dispatchQuery(query, { qtype: 'Word', qkey: 'hestur' }, {}, createTestContext());

    expect(query.toJSON()).toMatchObject({
      status: 'answered',
      qtype: 'Word',
      key: 'hestur',
      answer: 'Word: hestur',
      voiceAnswer: null,
    });
  });

  it('should record the handler answer', async () => {
    const person = vi.fn().mockResolvedValue({ answer: { answers: [] }, voiceAnswer: 'Svar.' });
    const handlers: QueryHandlers = { Person: person };
    const query = createQuery('hver er Jón');
    const ctx = createTestContext();

    await dispatchQuery(query, { qtype: 'Person', qkey: 'Jón' }, handlers, ctx);

    expect(person).toHaveBeenCalledWith(query, ctx, 'Jón');
    expect(query.toJSON()).toMatchObject({
      status: 'answered',
      qtype: 'Person',
      key: 'Jón',
      answer: { answers: [] },
      voiceAnswer: 'Svar.',
    });
  });

  it('should turn handler failures into an exception error', async () => {
    const handlers: QueryHandlers = {
      Entity: vi.fn().mockRejectedValue(new PersistenceError('corpus offline')),
    };
    const query = createQuery('hvað er Alþingi');

    await dispatchQuery(query, { qtype: 'Entity', qkey: 'Alþingi' }, handlers, createTestContext());

    expect(query.toJSON()).toMatchObject({
      status: 'errored',
      qtype: 'Entity',
      key: 'Alþingi',
      answer: null,
      error: 'E_EXCEPTION: corpus offline',
    });
  });

  it('should let invariant violations through', async () => {
    const handlers: QueryHandlers = {
      Search: vi.fn().mockRejectedValue(new InvariantViolation('weights out of step')),
    };
    const query = createQuery('leit');

    await expect(
      dispatchQuery(query, { qtype: 'Search', qkey: 'leit' }, handlers, createTestContext()),
    ).rejects.toThrow(InvariantViolation);
    expect(query.status).toBe('unresolved');
  });
});
